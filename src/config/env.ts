import dotenv from "dotenv";

dotenv.config();

function required(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

export const env = {
  PORT: Number(process.env.PORT) || 3000,
  DATABASE_URL: required("DATABASE_URL"),
  JWT_SECRET: required("JWT_SECRET"),
  JWT_EXPIRES_IN_SECONDS: Number(process.env.JWT_EXPIRES_IN_SECONDS) || 7 * 24 * 60 * 60,
  BCRYPT_ROUNDS: Number(process.env.BCRYPT_ROUNDS) || 10,
  LOG_LEVEL: process.env.LOG_LEVEL || "info",
} as const;
