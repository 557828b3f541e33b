type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
};

function parseLevel(value: string | undefined): LogLevel {
  const upper = value?.toUpperCase();
  if (upper === 'DEBUG' || upper === 'INFO' || upper === 'WARN' || upper === 'ERROR') {
    return upper;
  }
  return 'INFO';
}

export class Logger {
  constructor(
    private readonly minLevel: LogLevel = parseLevel(process.env.LOG_LEVEL),
    private readonly write: (line: string) => void = (line) => console.error(line)
  ) {}

  maskSensitiveData(data: string): string {
    return data
      // PEM blocks (private keys)
      .replace(/-----BEGIN [A-Z ]+-----[\s\S]*?-----END [A-Z ]+-----/g, '-----PEM***-----')
      // Bearer tokens: keep first 6 and last 4 chars
      .replace(/Bearer ([A-Za-z0-9._~+/=-]+)/g, (_match, token: string) =>
        token.length > 12
          ? `Bearer ${token.substring(0, 6)}...${token.substring(token.length - 4)}`
          : 'Bearer ***'
      )
      // Compact JWS (client secrets)
      .replace(/eyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g, 'eyJ***')
      // client_secret form values
      .replace(/client_secret=[^&\s"]+/g, 'client_secret=***');
  }

  private log(level: LogLevel, message: string, meta?: unknown): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    let logMessage = `[${timestamp}] [${level}] ${this.maskSensitiveData(message)}`;

    if (meta !== undefined) {
      logMessage += `\n${this.maskSensitiveData(JSON.stringify(meta, null, 2))}`;
    }

    // stdout carries records only
    this.write(logMessage);
  }

  debug(message: string, meta?: unknown): void {
    this.log('DEBUG', message, meta);
  }

  info(message: string, meta?: unknown): void {
    this.log('INFO', message, meta);
  }

  warn(message: string, meta?: unknown): void {
    this.log('WARN', message, meta);
  }

  error(message: string, error?: unknown): void {
    const meta = error instanceof Error
      ? {
          name: error.name,
          message: error.message,
          // Don't include stack traces in production
        }
      : error;
    this.log('ERROR', message, meta);
  }
}

export const logger = new Logger();
