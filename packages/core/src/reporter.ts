/**
 * Side-effecting collaborator that receives everything the validator wants
 * the host to see. The GitHub Action adapter maps it onto workflow commands;
 * tests and the CLI's JSON mode use RecordingReporter.
 */
export interface Reporter {
  setOutput(name: string, value: string): void;
  setFailed(message: string): void;
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
}

export type ReporterLevel = 'info' | 'warning' | 'error';

export interface ReporterMessage {
  level: ReporterLevel;
  message: string;
}

export class RecordingReporter implements Reporter {
  readonly outputs: Record<string, string> = {};
  readonly messages: ReporterMessage[] = [];
  failureMessage: string | undefined;

  setOutput(name: string, value: string): void {
    this.outputs[name] = value;
  }

  setFailed(message: string): void {
    this.failureMessage = message;
  }

  info(message: string): void {
    this.messages.push({ level: 'info', message });
  }

  warning(message: string): void {
    this.messages.push({ level: 'warning', message });
  }

  error(message: string): void {
    this.messages.push({ level: 'error', message });
  }

  get failed(): boolean {
    return this.failureMessage !== undefined;
  }

  messagesAt(level: ReporterLevel): string[] {
    return this.messages.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}
