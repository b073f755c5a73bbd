import * as path from "path";

export interface AppConfig {
  port: number;
  uploadDir: string;
  maxUploadBytes: number;
  debug: boolean;
}

const DEFAULT_PORT = 3000;
const DEFAULT_MAX_UPLOAD_MB = 50;

function readPositiveNumber(env: NodeJS.ProcessEnv, name: string, fallback: number, integer = false): number {
  const raw = env[name];
  if (raw === undefined || raw === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    console.warn(`[config] Ignoring invalid ${name}="${raw}", using ${fallback}`);
    return fallback;
  }
  return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: readPositiveNumber(env, "PORT", DEFAULT_PORT, true),
    uploadDir: path.resolve(env.UPLOAD_DIR || path.join(process.cwd(), "uploads")),
    maxUploadBytes: readPositiveNumber(env, "MAX_UPLOAD_MB", DEFAULT_MAX_UPLOAD_MB) * 1024 * 1024,
    debug: ["1", "true", "yes"].includes((env.DOCX_DEBUG ?? "").toLowerCase()),
  };
}
