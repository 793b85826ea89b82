import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import ini from 'ini';

type IniValue = string | boolean | number;
type IniSection = Record<string, IniValue>;
type IniConfig = Record<string, IniSection>;

export function configEnvFromNodeEnv(nodeEnv: string | undefined = process.env.NODE_ENV): string | undefined {
  if (nodeEnv === 'production') return 'prod';
  if (nodeEnv === 'development') return 'dev';
  return undefined;
}

export class ConfigLoader {
  private config: IniConfig;

  constructor(env?: string, configDir?: string) {
    const dir = configDir ?? this.resolveConfigDir();

    const base = this.readFile(path.join(dir, 'config.props'));
    const override = env ? this.readFile(path.join(dir, `config.${env}.props`)) : {};

    this.config = this.deepMerge(base, override);
  }

  get(section: string, key: string, fallback: number): number;
  get(section: string, key: string, fallback: boolean): boolean;
  get(section: string, key: string, fallback: string): string;
  get(section: string, key: string, fallback: IniValue): IniValue {
    const raw = this.config[section]?.[key];
    if (raw === undefined || raw === '') return fallback;

    // ini may parse `true`/`false` as actual booleans; normalise to string first
    const rawStr = String(raw);

    // Resolve ${ENV_VAR} placeholders
    if (rawStr.startsWith('${') && rawStr.endsWith('}')) {
      const resolved = process.env[rawStr.slice(2, -1)];
      if (resolved === undefined || resolved === '') return fallback;
      return this.coerce(resolved, fallback);
    }

    return this.coerce(rawStr, fallback);
  }

  private coerce(value: string, fallback: IniValue): IniValue {
    if (typeof fallback === 'number') {
      const n = Number(value);
      return Number.isFinite(n) ? n : fallback;
    }
    if (typeof fallback === 'boolean') return value === 'true';
    return value;
  }

  private resolveConfigDir(): string {
    // src/config/ → src/ → hub-server/ → packages/ → repo root
    const __filename = fileURLToPath(import.meta.url);
    return path.resolve(path.dirname(__filename), '..', '..', '..', '..', 'config');
  }

  private readFile(filePath: string): IniConfig {
    if (!fs.existsSync(filePath)) return {};
    return ini.parse(fs.readFileSync(filePath, 'utf-8'));
  }

  private deepMerge(base: IniConfig, override: IniConfig): IniConfig {
    const result: IniConfig = { ...base };
    for (const section of Object.keys(override)) {
      result[section] = { ...(base[section] ?? {}), ...override[section] };
    }
    return result;
  }
}
