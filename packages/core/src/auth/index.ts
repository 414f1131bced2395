export {
  AuthorizationContext,
  levelSatisfies,
  type PermissionLevel,
  type PermissionEntry,
} from "./context.js";
