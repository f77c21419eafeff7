/**
 * formatters.ts - Output formats for values JSON has no notation for
 *
 * The pretty printer falls back to this registry for anything that is not
 * null, a boolean, a number, a string, a byte array, an array or a plain
 * object. The first formatter that accepts a value wins.
 *
 * Register your own:
 *   formatterRegistry.register({
 *     accepts: (value: unknown): value is URL => value instanceof URL,
 *     format: (url) => JSON.stringify(url.href),
 *   });
 */

export interface ValueFormatter<V> {
  accepts(value: unknown): value is V;
  /**
   * @param prefix Indentation of the line the value starts on
   * @param indent Spaces per additional nesting level
   */
  format(value: V, prefix: string, indent: number): string;
}

export class FormatterRegistry {
  private formatters: ValueFormatter<unknown>[] = [];

  register<V>(formatter: ValueFormatter<V>): void {
    this.formatters.push(formatter);
  }

  clear(): void {
    this.formatters = [];
  }

  /**
   * Format `value` with the first formatter that accepts it, or return
   * undefined if none does.
   */
  format(value: unknown, prefix: string, indent: number): string | undefined {
    for (const formatter of this.formatters) {
      if (formatter.accepts(value)) {
        return formatter.format(value, prefix, indent);
      }
    }
    return undefined;
  }
}

export const dateFormatter: ValueFormatter<Date> = {
  accepts: (value): value is Date => value instanceof Date,
  format: (date) => JSON.stringify(date.toISOString()),
};

export const formatterRegistry = new FormatterRegistry();

formatterRegistry.register(dateFormatter);
