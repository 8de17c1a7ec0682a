import dotenv from "dotenv";
import path from "node:path";

dotenv.config();

const defaultRoot = path.resolve(__dirname, "..");

const toInt = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseInt(value ?? "", 10);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toFloat = (value: string | undefined, fallback: number): number => {
  const parsed = Number.parseFloat(value ?? "");
  return Number.isFinite(parsed) ? parsed : fallback;
};

const toBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
  return fallback;
};

const toList = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

export const config = {
  port: toInt(process.env.PORT, 7824),
  gatewayPort: toInt(process.env.GATEWAY_PORT, 7825),
  host: process.env.HOST ?? "127.0.0.1",
  uiRoot: path.resolve(process.env.UI_ROOT ?? path.join(defaultRoot, "public")),
  projectsRoot: path.resolve(process.env.PROJECTS_ROOT ?? path.join(defaultRoot, "production-ready")),
  openaiApiKey: process.env.OPENAI_API_KEY ?? "",
  openaiBaseUrl: process.env.OPENAI_BASE_URL ?? "http://localhost:11434/v1",
  enrichModel: process.env.ENRICH_MODEL ?? "llama3.1:8b",
  buildModel: process.env.BUILD_MODEL ?? "qwen2.5-coder:14b",
  maxFixAttempts: toInt(process.env.MAX_FIX_ATTEMPTS, 3),
  maxConcurrentRuns: toInt(process.env.MAX_CONCURRENT_RUNS, 2),
  installCommand: process.env.INSTALL_COMMAND ?? "npm install",
  serveCommand: process.env.SERVE_COMMAND ?? "npm run dev -- --port {port} --host {host} --strictPort",
  testCommand: process.env.TEST_COMMAND ?? "",
  devServerHost: process.env.DEV_SERVER_HOST ?? "127.0.0.1",
  devPortBase: toInt(process.env.DEV_PORT_BASE, 5173),
  installTimeoutMs: toInt(process.env.INSTALL_TIMEOUT_MS, 300_000),
  portTimeoutMs: toInt(process.env.PORT_TIMEOUT_MS, 35_000),
  testTimeoutMs: toInt(process.env.TEST_TIMEOUT_MS, 120_000),
  llmTimeoutMs: toInt(process.env.LLM_TIMEOUT_MS, 180_000),
  stopGraceMs: toInt(process.env.STOP_GRACE_MS, 3_000),
  portPollMaxIntervalMs: toInt(process.env.PORT_POLL_MAX_INTERVAL_MS, 1_000),
  serveStartAttempts: toInt(process.env.SERVE_START_ATTEMPTS, 2),
  maxCapturedLines: toInt(process.env.MAX_CAPTURED_LINES, 200),
  maxRetainedRuns: toInt(process.env.MAX_RETAINED_RUNS, 100),
  cancelOnDisconnect: toBoolean(process.env.CANCEL_ON_DISCONNECT, false),
  retainPreviewServer: toBoolean(process.env.RETAIN_PREVIEW_SERVER, false),
  extraActionableSignatures: toList(process.env.EXTRA_ACTIONABLE_SIGNATURES),
  extraNoiseSignatures: toList(process.env.EXTRA_NOISE_SIGNATURES),
  promptCostPer1k: toFloat(process.env.PROMPT_COST_PER_1K, 0),
  completionCostPer1k: toFloat(process.env.COMPLETION_COST_PER_1K, 0),
  logLevel: process.env.LOG_LEVEL ?? "info"
};

export type AppConfig = typeof config;

export const assertConfig = (): void => {
  if (!config.openaiApiKey) {
    throw new Error("OPENAI_API_KEY is required. Add it to .env or shell env (any value works for a local Ollama endpoint).");
  }
  if (config.maxFixAttempts < 0 || config.maxFixAttempts > 10) {
    throw new Error(`MAX_FIX_ATTEMPTS must be between 0 and 10, got ${config.maxFixAttempts}.`);
  }
  if (config.maxConcurrentRuns < 1) {
    throw new Error(`MAX_CONCURRENT_RUNS must be at least 1, got ${config.maxConcurrentRuns}.`);
  }
  if (config.maxRetainedRuns < 1) {
    throw new Error(`MAX_RETAINED_RUNS must be at least 1, got ${config.maxRetainedRuns}.`);
  }
  if (config.port === config.gatewayPort) {
    throw new Error("PORT and GATEWAY_PORT must differ.");
  }
  if (!config.serveCommand.includes("{port}")) {
    throw new Error("SERVE_COMMAND must contain a {port} placeholder.");
  }
};
