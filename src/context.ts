export type ContextValue =
  | string
  | number
  | boolean
  | null
  | ContextValue[]
  | { [key: string]: ContextValue };

/**
 * View of the session context handed to steps.
 */
export interface ReadonlyContext {
  get(key: string): ContextValue | undefined;
  has(key: string): boolean;
  keys(): string[];
  toJSON(): Record<string, ContextValue>;
}

/**
 * Ambient session state owned by the Autopilot.
 */
export class Context implements ReadonlyContext {
  private values = new Map<string, ContextValue>();

  get(key: string): ContextValue | undefined {
    return this.values.get(key);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }

  keys(): string[] {
    return [...this.values.keys()];
  }

  set(key: string, value: ContextValue): void {
    this.values.set(key, value);
  }

  delete(key: string): boolean {
    return this.values.delete(key);
  }

  toJSON(): Record<string, ContextValue> {
    return Object.fromEntries(this.values);
  }
}
