export {
  createCliContext,
  type CliContext,
  type ContextFactory,
  type CreateCliContextOptions,
  type GlobalOptions,
  type StorageCliContext,
} from "./context.js";
export { createProgram, runCli, type CliIO } from "./program.js";
