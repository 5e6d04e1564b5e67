function toInt(value: string | undefined, fallback: number): number {
  const parsed = value === undefined ? NaN : parseInt(value, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export default () => ({
  app: {
    name: process.env.APP_NAME || 'coursetrack',
    port: toInt(process.env.PORT, 4000),
  },

  database: {
    url: process.env.DATABASE_URL || undefined,
    host: process.env.DB_HOST || 'localhost',
    port: toInt(process.env.DB_PORT, 5432),
    username: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || '',
    database: process.env.DB_DATABASE || 'coursetrack',
    synchronize: process.env.DB_SYNCHRONIZE === 'true',
    logging: process.env.NODE_ENV === 'development',
    // bounded retry for connection-level failures
    retry: {
      attempts: toInt(process.env.DB_RETRY_ATTEMPTS, 3),
      delay_ms: toInt(process.env.DB_RETRY_DELAY_MS, 100),
    },
  },

  jwt: {
    secret: process.env.JWT_SECRET || '',
  },
});
