/**
 * Inspector configuration
 * Resolves connection settings and generation options from command-line arguments and the environment.
 */

import {
  NamingStyle,
  ReverseNamingStyle,
  camelCaseReverseNamingStyle,
  defaultReverseNamingStyle,
  lowerCaseSuffixNamingStyle,
  suffixNamingStyle,
} from './naming-style.js';
import type { NativeIntWidth } from './type-mapping.js';
import type { TableFilter } from './table-closure.js';

export class ConfigError extends Error {
  constructor(
    message: string,
    public cause?: Error
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface DatabaseConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean;
}

const LOCAL_HOST_PATTERNS = ['localhost', '127.0.0.1'];

function isLocalHost(hostname: string): boolean {
  return LOCAL_HOST_PATTERNS.some(pattern => hostname.includes(pattern)) || hostname.startsWith('192.168.');
}

/**
 * `ssl` and `sslmode` win over the host; local hosts connect without TLS
 */
function sslSetting(url: URL): boolean {
  const ssl = url.searchParams.get('ssl');
  const sslMode = url.searchParams.get('sslmode');
  if (ssl === 'true' || sslMode === 'require' || sslMode === 'prefer') return true;
  if (ssl === 'false' || sslMode === 'disable') return false;
  return !isLocalHost(url.hostname);
}

export function parseDatabaseUrl(url: string): DatabaseConfig {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new ConfigError('Invalid database URL', error instanceof Error ? error : undefined);
  }

  return {
    host: parsed.hostname,
    port: parseInt(parsed.port) || 5432,
    database: parsed.pathname.substring(1),
    user: decodeURIComponent(parsed.username),
    password: decodeURIComponent(parsed.password),
    ssl: sslSetting(parsed),
  };
}

export interface InspectorArgs {
  url?: string;
  schema?: string;
  'exclude-schemas'?: string;
  naming?: string;
  minimize?: boolean;
  baseline?: string;
  'int-width'?: string;
  'no-phantoms'?: boolean;
  out?: string;
}

export interface InspectorOptions {
  database: DatabaseConfig;
  schema?: string;
  excludeSchemas: string[];
  reverseNamingStyle: ReverseNamingStyle;
  /** Set when mappings are minimized against this convention */
  baseline?: NamingStyle;
  nativeIntWidth: NativeIntWidth;
  generateUniqueKeysPhantoms: boolean;
  out?: string;
}

const REVERSE_NAMING_STYLES = new Map<string, ReverseNamingStyle>([
  ['default', defaultReverseNamingStyle],
  ['camel', camelCaseReverseNamingStyle],
]);

const BASELINE_NAMING_STYLES = new Map<string, NamingStyle>([
  ['suffix', suffixNamingStyle],
  ['lowercase', lowerCaseSuffixNamingStyle],
]);

function splitList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);
}

export function resolveInspectorOptions(
  args: InspectorArgs,
  env: Record<string, string | undefined> = process.env
): InspectorOptions {
  const url = args.url || env.DATABASE_URL;
  if (!url) {
    throw new ConfigError('Database URL required: pass --url <url> or set DATABASE_URL');
  }

  const namingName = args.naming || env.REVERSE_NAMING || 'default';
  const reverseNamingStyle = REVERSE_NAMING_STYLES.get(namingName);
  if (!reverseNamingStyle) {
    throw new ConfigError(`Unknown naming style: ${namingName}`);
  }

  let baseline: NamingStyle | undefined;
  if (args.minimize) {
    const baselineName = args.baseline || 'suffix';
    baseline = BASELINE_NAMING_STYLES.get(baselineName);
    if (!baseline) {
      throw new ConfigError(`Unknown baseline naming style: ${baselineName}`);
    }
  }

  const intWidth = args['int-width'] || env.NATIVE_INT_WIDTH || '64';
  if (intWidth !== '32' && intWidth !== '64') {
    throw new ConfigError(`Native integer width must be 32 or 64, got ${intWidth}`);
  }

  const options: InspectorOptions = {
    database: parseDatabaseUrl(url),
    excludeSchemas: splitList(args['exclude-schemas'] || env.EXCLUDE_SCHEMAS),
    reverseNamingStyle,
    nativeIntWidth: intWidth === '32' ? 32 : 64,
    generateUniqueKeysPhantoms: !args['no-phantoms'],
  };
  const schema = args.schema || env.DB_SCHEMA;
  if (schema) options.schema = schema;
  if (baseline) options.baseline = baseline;
  if (args.out) options.out = args.out;
  return options;
}

/**
 * Follows references into every schema except the excluded ones
 */
export function makeTableFilter(excludeSchemas: string[]): TableFilter {
  const excluded = new Set(excludeSchemas);
  return name => name.schema === undefined || !excluded.has(name.schema);
}
