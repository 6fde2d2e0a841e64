import { z } from 'zod';
import { DEFAULT_ALLOWED_CONTENT_TYPES, LIMITS, PRESIGNED_URL, parseCsvList } from '@imagevault/shared';
import { logger } from '../utils/logger.js';

const booleanString = z
  .string()
  .trim()
  .toLowerCase()
  .refine((v) => ['1', '0', 'true', 'false', 'yes', 'no'].includes(v), { message: 'Expected a boolean flag' })
  .transform((v) => v === '1' || v === 'true' || v === 'yes');

const envSchemaBase = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).optional().default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).optional().default(3001),
  CORS_ALLOW_ORIGIN: z.string().min(1).optional().default('*'),

  AWS_REGION: z.string().min(1).optional(),
  AWS_DEFAULT_REGION: z.string().min(1).optional(),
  AWS_ENDPOINT_URL: z.string().url().optional(),
  AWS_ACCESS_KEY_ID: z.string().min(1).optional(),
  AWS_SECRET_ACCESS_KEY: z.string().min(1).optional(),

  S3_BUCKET_NAME: z.string().min(1).optional().default('image-storage-bucket'),
  S3_KEY_PREFIX: z.string().optional().default(''),
  S3_FORCE_PATH_STYLE: booleanString.optional(),
  S3_PRESIGNED_URL_EXPIRATION: z.coerce
    .number()
    .int()
    .positive()
    .max(PRESIGNED_URL.MAX_EXPIRY_SECONDS)
    .optional()
    .default(PRESIGNED_URL.DEFAULT_EXPIRY_SECONDS),

  DYNAMODB_TABLE_NAME: z.string().min(1).optional().default('images'),
  DYNAMODB_USER_INDEX: z.string().min(1).optional().default('UserIndex'),

  MAX_IMAGE_SIZE: z.coerce.number().int().positive().optional(),
  // Legacy name, read when MAX_IMAGE_SIZE is absent.
  MAX_FILE_SIZE: z.coerce.number().int().positive().optional(),
  ALLOWED_CONTENT_TYPES: z.string().min(1).optional(),

  HTTP_LOG_SAMPLE_RATE: z.coerce.number().min(0).max(1).optional(),
  HTTP_LOG_SLOW_MS: z.coerce.number().int().positive().optional(),
});

const envSchema = envSchemaBase.superRefine((env, ctx) => {
  if (Boolean(env.AWS_ACCESS_KEY_ID) !== Boolean(env.AWS_SECRET_ACCESS_KEY)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set together',
      path: [env.AWS_ACCESS_KEY_ID ? 'AWS_SECRET_ACCESS_KEY' : 'AWS_ACCESS_KEY_ID'],
    });
  }
  if (env.ALLOWED_CONTENT_TYPES !== undefined && parseCsvList(env.ALLOWED_CONTENT_TYPES).length === 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'ALLOWED_CONTENT_TYPES must list at least one MIME type',
      path: ['ALLOWED_CONTENT_TYPES'],
    });
  }
});

export type Env = z.infer<typeof envSchema>;

export type AppConfig = {
  nodeEnv: Env['NODE_ENV'];
  port: number;
  corsAllowOrigin: string;
  aws: {
    region: string;
    endpoint?: string;
    credentials?: { accessKeyId: string; secretAccessKey: string };
  };
  s3: {
    bucket: string;
    keyPrefix: string;
    forcePathStyle: boolean;
    presignedUrlExpirySeconds: number;
  };
  dynamodb: {
    tableName: string;
    userIndex: string;
  };
  images: {
    maxImageSize: number;
    allowedContentTypes: string[];
  };
  httpLog: {
    sampleRate: number;
    slowMs: number;
  };
};

export class ConfigError extends Error {
  public readonly issues: z.ZodIssue[];

  constructor(issues: z.ZodIssue[]) {
    super(`Invalid environment: ${issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function parseConfig(source: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(result.error.issues);
  }
  const env = result.data;

  const isProduction = env.NODE_ENV === 'production';
  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;

  return {
    nodeEnv: env.NODE_ENV,
    port: env.PORT,
    corsAllowOrigin: env.CORS_ALLOW_ORIGIN,
    aws: {
      region: env.AWS_REGION ?? env.AWS_DEFAULT_REGION ?? 'us-east-1',
      endpoint: env.AWS_ENDPOINT_URL,
      credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
    },
    s3: {
      bucket: env.S3_BUCKET_NAME,
      keyPrefix: env.S3_KEY_PREFIX,
      // custom endpoints (LocalStack/MinIO) need path-style addressing
      forcePathStyle: env.S3_FORCE_PATH_STYLE ?? Boolean(env.AWS_ENDPOINT_URL),
      presignedUrlExpirySeconds: env.S3_PRESIGNED_URL_EXPIRATION,
    },
    dynamodb: {
      tableName: env.DYNAMODB_TABLE_NAME,
      userIndex: env.DYNAMODB_USER_INDEX,
    },
    images: {
      maxImageSize: env.MAX_IMAGE_SIZE ?? env.MAX_FILE_SIZE ?? LIMITS.DEFAULT_MAX_IMAGE_SIZE,
      allowedContentTypes: env.ALLOWED_CONTENT_TYPES
        ? parseCsvList(env.ALLOWED_CONTENT_TYPES)
        : [...DEFAULT_ALLOWED_CONTENT_TYPES],
    },
    httpLog: {
      sampleRate: env.HTTP_LOG_SAMPLE_RATE ?? (isProduction ? 0.05 : 1),
      slowMs: env.HTTP_LOG_SLOW_MS ?? (isProduction ? 1000 : 2000),
    },
  };
}

let cached: AppConfig | null = null;

export function loadConfig(): AppConfig {
  if (cached) return cached;
  try {
    cached = parseConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('env.invalid', { issues: error.issues.map((i) => ({ path: i.path.join('.'), message: i.message })) });
    }
    throw error;
  }
  return cached;
}
