import 'dotenv/config';

const nodeEnv = process.env.NODE_ENV || 'development';

export const config = {
  port: parseInt(process.env.PORT || '8000', 10),
  nodeEnv,
  clientUrl: process.env.CLIENT_URL || '*',
  bodyLimit: process.env.BODY_LIMIT || '1mb',
  logRequests: nodeEnv !== 'test',
} as const;
