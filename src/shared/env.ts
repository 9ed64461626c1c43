/** Environment variables read by the CLI. Flags take precedence. */
export const KAK_JSON_UI_ENV = {
  LOG_LEVEL: "KAK_JSON_UI_LOG_LEVEL",
  LOG_FORMAT: "KAK_JSON_UI_LOG_FORMAT",
} as const;

export function getEnv(key: keyof typeof KAK_JSON_UI_ENV): string | undefined {
  return process.env[KAK_JSON_UI_ENV[key]];
}
