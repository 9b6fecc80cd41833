import 'dotenv/config';

export const config = {
  port: parseInt(process.env.PORT || '3003', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  corsOrigin: process.env.CORS_ORIGIN || 'http://localhost:5173',
  // Seeds the in-memory role registry on every start; roles are not persisted.
  adminId: process.env.ADMIN_ID || 'admin',
  database: {
    url: process.env.DATABASE_URL || undefined,
  },
  transfer: {
    url: process.env.TRANSFER_URL || undefined,
    timeoutMs: parseInt(process.env.TRANSFER_TIMEOUT_MS || '5000', 10),
  },
  isDev: (process.env.NODE_ENV || 'development') === 'development',
  isProd: process.env.NODE_ENV === 'production',
} as const;
