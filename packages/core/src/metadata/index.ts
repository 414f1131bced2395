export {
  ObjectMetadataSchema,
  normalizeMetadata,
  parseMetadataJson,
} from "./normalize.js";
