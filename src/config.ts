import path from "node:path";

import dotenv from "dotenv";

dotenv.config();

type Env = Record<string, string | undefined>;

const parseIdList = (value: string): number[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean)
    .map((item) => Number(item))
    .filter((item) => Number.isInteger(item));

export interface StateTtls {
  sessionMs: number;
  wizardMs: number;
  thresholdMs: number;
}

export interface AppConfig {
  botToken: string;
  superadmins: number[];
  dataDir: string;
  ttl: StateTtls;
  sweepIntervalMs: number;
  maxMessageLength: number;
  transport: "polling" | "webhook";
}

export const loadConfig = (env: Env = process.env): AppConfig => {
  const required = (key: string): string => {
    const value = env[key];
    if (!value) throw new Error(`Missing required env var: ${key}`);
    return value;
  };

  const seconds = (key: string, fallback: number, allowZero = false): number => {
    const raw = env[key];
    const value = raw === undefined || raw === "" ? fallback : Number(raw);
    if (!Number.isFinite(value) || value < 0 || (!allowZero && value === 0)) {
      throw new Error(`${key} must be a ${allowZero ? "non-negative" : "positive"} number of seconds`);
    }
    return value * 1000;
  };

  const botToken = required("BOT_TOKEN");
  const superadmins = parseIdList(required("SUPERADMIN_USER_IDS"));
  if (superadmins.length === 0) {
    throw new Error("SUPERADMIN_USER_IDS must contain at least one numeric user id");
  }

  const transport = env.BOT_TRANSPORT ?? "polling";
  if (transport !== "polling" && transport !== "webhook") {
    throw new Error("BOT_TRANSPORT must be polling or webhook");
  }

  const maxMessageLength = Number(env.MAX_MESSAGE_LENGTH ?? "4000");
  if (!Number.isInteger(maxMessageLength) || maxMessageLength <= 0) {
    throw new Error("MAX_MESSAGE_LENGTH must be a positive integer");
  }

  return {
    botToken,
    superadmins,
    dataDir: path.resolve(env.DATA_DIR ?? "./data"),
    ttl: {
      sessionMs: seconds("SESSION_TTL_SECONDS", 3600),
      wizardMs: seconds("WIZARD_TTL_SECONDS", 1800),
      thresholdMs: seconds("THRESHOLD_TTL_SECONDS", 600),
    },
    sweepIntervalMs: seconds("SWEEP_INTERVAL_SECONDS", 300, true),
    maxMessageLength,
    transport,
  };
};
