import chalk from 'chalk';
import { NameServerSet } from '../types/index.js';

export interface LogSink {
  out(line: string): void;
  err(line: string): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
  sink?: LogSink;
}

const consoleSink: LogSink = {
  out: line => console.log(line),
  err: line => console.error(line)
};

export class Logger {
  private readonly verbose: boolean;
  private readonly silent: boolean;
  private readonly sink: LogSink;

  constructor(private readonly scope: string, options: LoggerOptions = {}) {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
    this.sink = options.sink ?? consoleSink;
  }

  /**
   * Logger for a sub-component, sharing switches and sink
   */
  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`, {
      verbose: this.verbose,
      silent: this.silent,
      sink: this.sink
    });
  }

  header(message: string): void {
    this.write('out', chalk.bold.blue(`\n${message}`));
  }

  success(message: string): void {
    this.write('out', chalk.green(`✅ ${message}`));
  }

  info(message: string): void {
    this.write('out', chalk.blue(`ℹ️  ${message}`));
  }

  warn(message: string): void {
    this.write('err', chalk.yellow(`⚠️  ${message}`));
  }

  error(message: string): void {
    this.write('err', chalk.red(`❌ ${message}`));
  }

  debug(message: string): void {
    if (this.verbose) {
      this.write('out', chalk.gray(`[${this.scope}] ${message}`));
    }
  }

  /**
   * Delegation instructions. Goes to stderr so that it survives stdout redirection.
   */
  nameServerBanner(domainName: string, nameServers: NameServerSet): void {
    const lines = [
      chalk.bold.yellow(`\nUpdate the nameservers for ${domainName} at your registrar:`),
      ...nameServers.map(ns => chalk.cyan(`  ${ns}`)),
      chalk.yellow('Propagation usually takes 5-30 minutes, occasionally up to 48 hours.')
    ];
    lines.forEach(line => this.write('err', line));
  }

  /**
   * Plain line on stdout, for summaries that scripts may parse
   */
  plain(message: string): void {
    this.write('out', message);
  }

  private write(stream: 'out' | 'err', line: string): void {
    if (this.silent) {
      return;
    }
    if (stream === 'out') {
      this.sink.out(line);
    } else {
      this.sink.err(line);
    }
  }
}

export function createLogger(scope: string, options?: LoggerOptions): Logger {
  return new Logger(scope, options);
}
