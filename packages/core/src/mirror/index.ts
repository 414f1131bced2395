export {
  createMirrorManager,
  type MirrorManager,
  type MirrorManagerOptions,
} from "./manager.js";
export { buildBucketDir, buildMirrorPath } from "./paths.js";
