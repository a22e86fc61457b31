import dotenv from 'dotenv';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Package root .env; src/config and dist/config both sit two levels below it
export const envFilePath = resolve(__dirname, '../../.env');
dotenv.config({ path: envFilePath });

interface Config {
  nodeEnv: string;
  logLevel: string;
  appId: string;
  privateKeyPath: string;
  apiUrl: string;
  apiTimeoutMs: number;
  jwtLifetimeMs: number;
  jwtRenewalMarginMs: number;
  jwtClockDriftMs: number;
  accessTokenRefreshMarginMs: number;
}

const nodeEnv = process.env.NODE_ENV || 'development';

function defaultLogLevel(env: string): string {
  if (env === 'production') return 'info';
  if (env === 'test') return 'silent';
  return 'debug';
}

export const config: Config = {
  nodeEnv,
  logLevel: process.env.LOG_LEVEL || defaultLogLevel(nodeEnv),
  appId: process.env.GITHUB_APP_ID || '',
  privateKeyPath: process.env.GITHUB_PRIVATE_KEY_PATH || '',
  apiUrl: process.env.GITHUB_API_URL || 'https://api.github.com',
  apiTimeoutMs: parseInt(process.env.GITHUB_API_TIMEOUT_MS || '10000', 10),
  jwtLifetimeMs: parseInt(process.env.JWT_LIFETIME_MS || '600000', 10), // 10 minutes, the API maximum
  jwtRenewalMarginMs: parseInt(process.env.JWT_RENEWAL_MARGIN_MS || '120000', 10), // 2 minutes
  jwtClockDriftMs: parseInt(process.env.JWT_CLOCK_DRIFT_MS || '60000', 10), // 60 seconds
  accessTokenRefreshMarginMs: parseInt(process.env.ACCESS_TOKEN_REFRESH_MARGIN_MS || '120000', 10), // 2 minutes
};
