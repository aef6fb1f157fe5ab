export {
  PermissionsService,
  NO_PERMISSION,
  DEFAULT_NO_PERMISSION_LORE,
  type Permissible,
} from "./service";
