import { resolveVariables, type VariableState } from './variables.js';

export class ExecutionState {
  private readonly values: Record<string, unknown> = {};

  get(key: string): unknown {
    return this.values[key];
  }

  set(key: string, value: unknown): void {
    this.values[key] = value;
  }

  has(key: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.values, key);
  }

  resolve(value: unknown): unknown {
    return resolveVariables(value, this.values);
  }

  snapshot(): VariableState {
    return { ...this.values };
  }
}
