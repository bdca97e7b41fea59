import fs from 'fs';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { configSchema, type Config } from './schema.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// 環境変数をオブジェクトにマッピング
function resolveEnvVariables(obj: unknown): unknown {
  if (typeof obj === 'string') {
    // ${ENV_VAR} 形式の環境変数を解決
    return obj.replace(/\$\{(\w+)\}/g, (_, envVar: string) => {
      return process.env[envVar] ?? '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map(resolveEnvVariables);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = resolveEnvVariables(value);
    }
    return result;
  }
  return obj;
}

// 未設定（空文字）の値を取り除く。スキーマのデフォルト値を効かせるため
function dropEmptyStrings(obj: unknown): unknown {
  if (Array.isArray(obj)) {
    return obj.map(dropEmptyStrings);
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      if (value === '') continue;
      result[key] = dropEmptyStrings(value);
    }
    return result;
  }
  return obj;
}

// ネストしたセクションを取得（なければ作成）
function section(parent: Record<string, unknown>, ...keys: string[]): Record<string, unknown> {
  let current = parent;
  for (const key of keys) {
    const existing = current[key];
    if (isRecord(existing)) {
      current = existing;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }
  return current;
}

// 環境変数 → 設定キーの対応
const ENV_OVERRIDES: { env: string; path: string[]; key: string }[] = [
  { env: 'READWISE_TOKEN', path: ['source', 'readwise'], key: 'token' },
  { env: 'GENERATION_API_URL', path: ['generation', 'http'], key: 'baseUrl' },
  { env: 'GENERATION_API_TOKEN', path: ['generation', 'http'], key: 'apiToken' },
  { env: 'R2_ACCOUNT_ID', path: ['publish', 's3'], key: 'accountId' },
  { env: 'R2_ACCESS_KEY_ID', path: ['publish', 's3'], key: 'accessKeyId' },
  { env: 'R2_SECRET_ACCESS_KEY', path: ['publish', 's3'], key: 'secretAccessKey' },
  { env: 'R2_BUCKET_NAME', path: ['publish', 's3'], key: 'bucket' },
  { env: 'R2_PUBLIC_URL', path: ['publish'], key: 'baseUrl' },
  { env: 'LOG_LEVEL', path: ['logging'], key: 'level' },
];

// 設定ファイルを読み込む
export function loadConfig(configPath?: string): Config {
  const defaultConfigPath = path.resolve(process.cwd(), 'config/default.yaml');
  const filePath = configPath ?? defaultConfigPath;

  let rawConfig: unknown = {};

  if (fs.existsSync(filePath)) {
    const content = fs.readFileSync(filePath, 'utf-8');
    rawConfig = parseYaml(content);
  } else if (configPath) {
    throw new Error(`設定ファイルが見つかりません: ${configPath}`);
  }

  // 環境変数を解決
  const resolved = dropEmptyStrings(resolveEnvVariables(rawConfig));
  const config: Record<string, unknown> = isRecord(resolved) ? resolved : {};

  // 環境変数からのオーバーライド
  for (const { env, path: keys, key } of ENV_OVERRIDES) {
    const value = process.env[env];
    if (value) {
      section(config, ...keys)[key] = value;
    }
  }
  if (process.env.PORT) {
    section(config, 'server').port = parseInt(process.env.PORT, 10);
  }

  // バリデーションとデフォルト値の適用
  return configSchema.parse(config);
}

export { configSchema, type Config } from './schema.js';
