/**
 * Item permission nodes.
 *
 * Role in system:
 * - Maps each item to the permission node a player needs to use it, as
 *   configured in `permissions.yml` under `<ITEM_ID>.permission`.
 * - The config manager calls `update(item, false)` for every item on reload.
 *
 * Invariants:
 * - The cache only holds real nodes; `none` in the file means "no node".
 *
 * Gotchas:
 * - `update` and `register` only write defaults; existing entries win.
 */
import type { ConfigDocument } from "@/configuration/document";
import type { GameItem } from "@/modules/items";

export const NO_PERMISSION = "none";
export const DEFAULT_NO_PERMISSION_LORE = ["&4You do not have the permission to do this!"];

/** Anything that can hold permission nodes (player, console, test double). */
export interface Permissible {
  hasPermission(node: string): boolean;
}

export class PermissionsService {
  private readonly nodes = new Map<string, string>();

  constructor(private readonly config: ConfigDocument) {}

  getConfig(): ConfigDocument {
    return this.config;
  }

  /**
   * Register every item, saving the document once at the end.
   *
   * @sideEffects Writes defaults for unknown items; saves when `save` is true.
   */
  register(items: Iterable<GameItem>, save: boolean): void {
    for (const item of items) {
      this.update(item, false);
    }

    if (save) {
      this.config.save();
    }
  }

  /**
   * Refresh the cached node of a single item from the document.
   *
   * @errors Propagates document save failures when `save` is true.
   */
  update(item: GameItem, save: boolean): void {
    const path = `${item.id}.permission`;
    this.config.setDefaultValue(path, NO_PERMISSION);
    this.config.setDefaultValue(`${item.id}.lore`, DEFAULT_NO_PERMISSION_LORE);

    const node = this.config.getString(path);
    if (node === null || node === NO_PERMISSION || node.trim() === "") {
      this.nodes.delete(item.id);
    } else {
      this.nodes.set(item.id, node);
    }

    if (save) {
      this.config.save();
    }
  }

  getPermission(item: GameItem): string | null {
    return this.nodes.get(item.id) ?? null;
  }

  setPermission(item: GameItem, node: string | null): void {
    this.config.setValue(`${item.id}.permission`, node ?? NO_PERMISSION);
    this.update(item, false);
  }

  getLore(item: GameItem): string[] {
    return this.config.getStringList(`${item.id}.lore`);
  }

  hasPermission(subject: Permissible, item: GameItem | null): boolean {
    if (!item) return true;

    const node = this.nodes.get(item.id);
    return node === undefined || subject.hasPermission(node);
  }
}
