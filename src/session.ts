// src/session.ts - Line-at-a-time front end for a host application
import { ExecResult } from './types';
import { parse } from './parser';
import { Evaluator } from './evaluator';
import { FileProfileStore, ProfileStore } from './profiles';
import { CalcConfig, loadConfig } from './config';
import { Logger, createLogger } from './logger';

/**
 * Full pipeline for one line: scan → parse → exec. Parse errors are
 * returned as they are and never reach the evaluator.
 */
export function calculate(
  evaluator: Evaluator,
  input: string,
  commit: boolean = true,
  logger?: Logger
): ExecResult {
  const { nodes, error } = parse(input, { logger });
  if (error) {
    return { result: '', error };
  }
  return evaluator.exec(nodes, commit);
}

export interface CalculatorOptions {
  config: CalcConfig;
  store?: ProfileStore; // defaults to files under config.storageRoot
  logger?: Logger;
  onSave?: (profile: string) => void;
}

export class Calculator {
  readonly evaluator: Evaluator;
  readonly config: CalcConfig;
  private readonly logger: Logger;

  constructor(options: CalculatorOptions) {
    this.config = options.config;
    this.logger =
      options.logger ?? createLogger({ level: options.config.logLevel });
    this.evaluator = new Evaluator({
      store:
        options.store ??
        new FileProfileStore(
          options.config.storageRoot,
          this.logger.child('profiles')
        ),
      onSave: options.onSave,
      logger: this.logger.child('evaluator'),
    });
  }

  /**
   * Creates a calculator from the process environment and loads its start
   * profile when one has been saved.
   */
  static fromEnvironment(
    env: NodeJS.ProcessEnv = process.env,
    platform: NodeJS.Platform = process.platform
  ): Calculator {
    const { config, warnings } = loadConfig(env, platform);
    const calculator = new Calculator({ config });
    for (const warning of warnings) calculator.logger.warn(warning);
    calculator.loadStartProfile();
    return calculator;
  }

  /**
   * Loads the configured profile if it exists; null when there is none.
   */
  loadStartProfile(): ExecResult | null {
    const { profile } = this.config;
    if (!this.evaluator.hasProfile(profile)) {
      this.logger.debug('no start profile', { profile });
      return null;
    }
    const outcome = this.submit(`load(${profile})`);
    if (outcome.error) this.logger.warn(outcome.error.message);
    return outcome;
  }

  /**
   * Evaluates a line as typed so far without touching any state: variables
   * are not assigned and clear, save and load are not run.
   */
  preview(line: string): ExecResult {
    const { nodes, error } = parse(line, {
      logger: this.logger.child('parser'),
    });
    if (error) return { result: '', error };
    const verb = nodes[0].kind;
    if (verb === 'clear' || verb === 'save' || verb === 'load') {
      return { result: '', error: null };
    }
    return this.evaluator.exec(nodes, false);
  }

  /** Evaluates a line and commits its effects. */
  submit(line: string): ExecResult {
    return calculate(this.evaluator, line, true, this.logger.child('parser'));
  }
}
