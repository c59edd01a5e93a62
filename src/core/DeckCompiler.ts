/**
 * DSL compilation through the external compiler.
 */

import { spawn } from 'node:child_process';
import { CompileError } from './errors.js';
import { loadEnvironmentConfig } from './config.js';
import type { ILogger } from '../utils/Logger.js';
import { createLogger } from '../utils/Logger.js';

/**
 * Turns DSL source into deck XML.
 */
export interface DeckCompiler {
  compile(source: string): Promise<string>;
}

/**
 * Configuration for DeckshCompiler.
 */
export interface DeckshCompilerConfig {
  /** Executable to run; defaults to DECKSH_BIN or `decksh` */
  command?: string;
  /** Extra arguments */
  args?: readonly string[];
  /** Kill the compiler after this many milliseconds (0 disables) */
  timeout?: number;
  /** Logger instance */
  logger?: ILogger;
}

/**
 * Runs the `decksh` executable with the DSL on stdin and reads XML from stdout.
 */
export class DeckshCompiler implements DeckCompiler {
  private readonly logger: ILogger;
  private readonly command: string;
  private readonly args: readonly string[];
  private readonly timeout: number;

  constructor(config: DeckshCompilerConfig = {}) {
    this.logger = config.logger ?? createLogger('warn', 'DeckshCompiler');
    this.command = config.command ?? loadEnvironmentConfig().compilerPath;
    this.args = config.args ?? [];
    this.timeout = config.timeout ?? 0;
  }

  /**
   * @throws CompileError when the compiler cannot start or exits non-zero;
   * the message is the compiler's stderr
   */
  compile(source: string): Promise<string> {
    this.logger.debug('Compiling', { command: this.command, bytes: source.length });

    return new Promise((resolve, reject) => {
      const proc = spawn(this.command, [...this.args], {
        stdio: ['pipe', 'pipe', 'pipe'],
      });

      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      proc.stdout.on('data', (data: Buffer) => {
        stdout.push(data);
      });

      proc.stderr.on('data', (data: Buffer) => {
        stderr.push(data);
      });

      const timeoutId =
        this.timeout > 0
          ? setTimeout(() => {
              proc.kill('SIGKILL');
            }, this.timeout)
          : undefined;

      proc.on('error', (error) => {
        clearTimeout(timeoutId);
        reject(new CompileError(`Cannot run ${this.command}: ${error.message}`, null, { cause: error }));
      });

      proc.on('close', (code, signal) => {
        clearTimeout(timeoutId);
        const errorText = Buffer.concat(stderr).toString('utf8');
        if (code !== 0) {
          const reason = signal ? `killed by ${signal}` : `exited with code ${code ?? 'unknown'}`;
          reject(new CompileError(errorText.length > 0 ? errorText : `${this.command} ${reason}`, code));
          return;
        }
        if (errorText) {
          this.logger.warn('Compiler wrote to stderr', { stderr: errorText.trim() });
        }
        resolve(Buffer.concat(stdout).toString('utf8'));
      });

      // A compiler that exits before reading all input closes stdin early.
      proc.stdin.on('error', (error) => {
        this.logger.debug('Compiler stdin closed', { error: error.message });
      });
      proc.stdin.end(source, 'utf8');
    });
  }
}

/**
 * Compiler that passes its input through unchanged, for sources that are
 * already deck XML.
 */
export class PassThroughCompiler implements DeckCompiler {
  compile(source: string): Promise<string> {
    return Promise.resolve(source);
  }
}
