import path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';

// Resolve paths from the project root so the service runs from any cwd
const projectRoot = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

function optionalInt(key: string, fallback: number): number {
  const val = process.env[key];
  if (!val) return fallback;
  const parsed = Number.parseInt(val, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Env var ${key} must be an integer, got '${val}'`);
  }
  return parsed;
}

const port = optionalInt('PORT', 8787);

export const env = {
  port,
  baseUrl: optional('BASE_URL', `http://127.0.0.1:${port}`),
  logLevel: optional('LOG_LEVEL', 'info'),
  jsonBodyLimit: optional('JSON_BODY_LIMIT', '100kb'),

  triage: {
    mockDataDir: path.resolve(projectRoot, optional('MOCK_DATA_DIR', 'mock_data')),
    sampleOrderLimit: optionalInt('SAMPLE_ORDER_LIMIT', 6),
  },
} as const;
