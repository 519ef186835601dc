import type { Reporter } from '@commitguard/core';
import pc from 'picocolors';

/**
 * Text-mode reporter for local runs. Outputs print as `name=value`.
 */
export class ConsoleReporter implements Reporter {
  private readonly colors: ReturnType<typeof pc.createColors>;

  constructor(color: boolean = pc.isColorSupported) {
    this.colors = pc.createColors(color);
  }

  setOutput(name: string, value: string): void {
    console.log(`${this.colors.dim(`${name}=`)}${value}`);
  }

  setFailed(message: string): void {
    console.error(`${this.colors.red('failed')}: ${message}`);
  }

  info(message: string): void {
    console.log(message);
  }

  warning(message: string): void {
    console.warn(`${this.colors.yellow('warning')}: ${message}`);
  }

  error(message: string): void {
    console.error(`${this.colors.red('error')}: ${message}`);
  }
}
