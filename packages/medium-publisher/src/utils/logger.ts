import chalk from 'chalk';

export type LogLevel = 'info' | 'success' | 'warn' | 'error';

/**
 * Console logger: coloured lines for people, JSON lines with --json
 */
export class Logger {
  constructor(private jsonMode = false) {}

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  success(message: string, data?: Record<string, unknown>): void {
    this.log('success', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();

    if (this.jsonMode) {
      const logEntry = {
        timestamp,
        level,
        message,
        ...data,
      };
      console.log(JSON.stringify(logEntry));
      return;
    }

    const formattedData = data ? ` ${JSON.stringify(data)}` : '';
    const line = `${message}${formattedData}`;

    switch (level) {
      case 'success':
        console.log(chalk.greenBright(`✅ ${line}`));
        break;
      case 'warn':
        console.log(chalk.yellow(`⚠️  ${line}`));
        break;
      case 'error':
        console.error(chalk.redBright(`❌ ${line}`));
        break;
      default:
        console.log(chalk.yellowBright(line));
    }
  }
}
