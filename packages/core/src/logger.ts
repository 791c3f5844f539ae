import pino, { type Logger, type LoggerOptions } from 'pino';

export type ClusterLogger = Logger<'success'>;

const customLevels = { success: 35 } as const;

export function debugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const flag = env.KUBEFORGE_DEBUG?.trim().toLowerCase();
  return Boolean(flag) && flag !== '0' && flag !== 'false';
}

export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  return debugEnabled(env) ? 'debug' : 'info';
}

export interface CreateLoggerOptions {
  name?: string;
  level?: string;
  pretty?: boolean;
}

export function createLogger(options: CreateLoggerOptions = {}): ClusterLogger {
  const config: LoggerOptions<'success'> = {
    name: options.name ?? 'kubeforge',
    level: options.level ?? resolveLevel(),
    customLevels,
  };

  if (options.pretty) {
    config.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        ignore: 'pid,hostname,name',
        customLevels: 'success:35',
        customColors: 'success:green',
      },
    };
  }

  return pino(config);
}

export function silentLogger(): ClusterLogger {
  return createLogger({ level: 'silent' });
}

/** Shows enough of a secret to tell two apart in logs. */
export function redact(secret: string, visible = 10): string {
  if (secret.length <= visible) return '***';
  return `${secret.slice(0, visible)}...`;
}
