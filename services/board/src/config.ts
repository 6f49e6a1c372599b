import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4020),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.string().default('info'),
  SESSION_SECRET: z.string().min(1).default('board_session_secret'),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(14 * 24 * 60 * 60),
  // Transport ceiling only; the 50KB payload rule is enforced by the JSON parser.
  BOARD_BODY_LIMIT: z.coerce.number().int().positive().default(1024 * 1024),
});

export type BoardConfig = {
  port: number;
  host: string;
  logLevel: string;
  sessionSecret: string;
  sessionTtlSeconds: number;
  bodyLimit: number;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): BoardConfig => {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    host: parsed.HOST,
    logLevel: parsed.LOG_LEVEL,
    sessionSecret: parsed.SESSION_SECRET,
    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,
    bodyLimit: parsed.BOARD_BODY_LIMIT,
  };
};
