import pino from "pino";
import { env, type AppEnv } from "../config/env";

export const resolveLogLevel = (
  appEnv: Pick<AppEnv, "LOG_LEVEL" | "NODE_ENV">,
): string => {
  if (appEnv.LOG_LEVEL) return appEnv.LOG_LEVEL;
  if (appEnv.NODE_ENV === "production") return "info";
  if (appEnv.NODE_ENV === "test") return "silent";
  return "debug";
};

export const logger = pino({
  name: "ringside-wire",
  level: resolveLogLevel(env),
});
