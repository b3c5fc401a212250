import type { OutputChannel } from '../action/outputs.js';

export class MemoryOutputChannel implements OutputChannel {
  public readonly outputs = new Map<string, string>();
  public readonly summaries: string[] = [];
  public readonly masked: string[] = [];
  public readonly errors: string[] = [];

  setOutput(name: string, value: string): void {
    this.outputs.set(name, value);
  }

  appendSummary(markdown: string): void {
    this.summaries.push(markdown);
  }

  mask(value: string): void {
    this.masked.push(value);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}
