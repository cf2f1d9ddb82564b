/**
 * Per-instance backend configuration.
 *
 * An open string-keyed map: the registry and dispatcher never look inside it,
 * each backend reads the keys it understands.
 */

export type ConfigValues = Record<string, unknown>;

export class BackendConfig {
  private params: Map<string, unknown>;

  constructor(params: ConfigValues = {}) {
    this.params = new Map(Object.entries(params));
  }

  /** Raw value, or `fallback` when the key is absent (a stored `undefined` counts as present). */
  get(key: string, fallback?: unknown): unknown {
    return this.params.has(key) ? this.params.get(key) : fallback;
  }

  getString(key: string, fallback: string): string;
  getString(key: string): string | undefined;
  getString(key: string, fallback?: string): string | undefined {
    const value = this.params.get(key);
    return typeof value === "string" ? value : fallback;
  }

  getNumber(key: string, fallback: number): number;
  getNumber(key: string): number | undefined;
  getNumber(key: string, fallback?: number): number | undefined {
    const value = this.params.get(key);
    return typeof value === "number" && Number.isFinite(value) ? value : fallback;
  }

  getBoolean(key: string, fallback: boolean): boolean {
    const value = this.params.get(key);
    return typeof value === "boolean" ? value : fallback;
  }

  has(key: string): boolean {
    return this.params.has(key);
  }

  set(key: string, value: unknown): void {
    this.params.set(key, value);
  }

  update(patch: ConfigValues): void {
    for (const [key, value] of Object.entries(patch)) {
      this.params.set(key, value);
    }
  }

  toDict(): ConfigValues {
    return Object.fromEntries(this.params);
  }
}
