import { z } from "zod";
import dotenv from "dotenv";
import path from "path";
import { fileURLToPath } from "url";

const currentFile = fileURLToPath(import.meta.url);
const currentDir = path.dirname(currentFile);

// Running from apps/api or from the repository root both pick up the root .env.
dotenv.config({ path: path.resolve(process.cwd(), ".env") });
dotenv.config({ path: path.resolve(currentDir, "../../../../.env") });

const booleanFlag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().default(5000),
  CORS_ORIGIN: z.string().default("*"),
  APP_NAME: z.string().default("Storefront API"),
  STORE_DRIVER: z.enum(["mongo", "memory"]).default("mongo"),
  MONGODB_URI: z.string().min(1).default("mongodb://127.0.0.1:27017"),
  MONGODB_DB_NAME: z.string().min(1).default("storefront"),
  MONGODB_TRANSACTIONS: booleanFlag,
  JWT_SECRET: z.string().min(16),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(10),
  WEBHOOK_TIMEOUT_MS: z.coerce.number().int().positive().default(2000)
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
