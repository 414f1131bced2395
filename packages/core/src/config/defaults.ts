import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), ".s3mirror");
export const DEFAULT_CONFIG_FILENAME = "s3mirror.config.json";
export const DEFAULT_MOCK_ENDPOINT = "http://localhost:5000";
export const DEFAULT_REGION = "us-east-1";
