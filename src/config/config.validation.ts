import * as Joi from "joi";

export const configValidation = Joi.object({
  NODE_ENV: Joi.string()
    .valid("development", "production", "test")
    .default("development"),
  PORT: Joi.number().default(4000),

  // Database
  DATABASE_URL: Joi.string().required(),
  DB_POOL_SIZE: Joi.number().integer().min(1).default(10),
  DB_IDLE_TIMEOUT: Joi.number().integer().min(0).default(20),
  DB_CONNECT_TIMEOUT: Joi.number().integer().min(1).default(10),

  // Order placement
  ORDER_LOCK_TIMEOUT_MS: Joi.number().integer().min(1).default(5000),
  ORDER_ISOLATION_LEVEL: Joi.string()
    .valid("read committed", "repeatable read", "serializable")
    .default("read committed"),

  // Rate limiting
  THROTTLE_TTL_MS: Joi.number().integer().min(1).default(60000),
  THROTTLE_LIMIT: Joi.number().integer().min(1).default(100),
});
