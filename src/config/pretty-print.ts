/**
 * pretty-print.ts - Human-oriented JSON layout for configuration trees
 *
 * Objects put one entry per line. Arrays stay on one line,
 * `[ 1, 2, 3 ]`, until they hold a container or grow past the line width,
 * then they put one element per line. Excluded key paths are dropped from
 * objects reachable through object keys only; exclusion does not look
 * inside arrays.
 *
 * Example (indent 4, rootIndent true):
 *   {
 *       "name": "demo",
 *       "server": {
 *           "ports": [ 80, 443 ]
 *       }
 *   }
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { makeExclusionTrie } from './exclusion.js';
import type { ExclusionTrie } from './exclusion.js';
import { formatterRegistry } from './formatters.js';
import type { FormatterRegistry } from './formatters.js';
import { describeType, isPlainObject } from './values.js';
import type { ConfigObject } from './values.js';

function isEncodingLabel(label: string): boolean {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
}

export const prettyPrintOptionsSchema = z.object({
  /** Spaces per nesting level */
  indent: z.number().int().min(0).default(4),
  /** Indent the entries of the root object as well */
  rootIndent: z.boolean().default(false),
  /** Width at which single-line arrays are broken up */
  lineWidth: z.number().int().positive().default(120),
  /** true/false when set, 1/0 otherwise */
  boolFormat: z.boolean().default(true),
  /** Encoding used to print byte arrays as strings; null prints hex bytes */
  bytesFormat: z
    .string()
    .refine(isEncodingLabel, { message: 'Unknown text encoding' })
    .nullable()
    .default('utf-8'),
  /** Top-level keys, or key lists for nested entries */
  exclude: z.array(z.union([z.string(), z.array(z.string())])).default([]),
});

export type PrettyPrintOptions = z.input<typeof prettyPrintOptionsSchema>;

type ResolvedOptions = z.output<typeof prettyPrintOptionsSchema>;

export function parsePrettyPrintOptions(options: PrettyPrintOptions = {}): ResolvedOptions {
  const parsed = prettyPrintOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid print options: ${issues.join('; ')}`, { cause: parsed.error });
  }
  return parsed.data;
}

function hex(byte: number): string {
  return byte.toString(16).toUpperCase().padStart(2, '0');
}

class Printer {
  private readonly out: string[] = [];
  private readonly indent: number;
  private readonly exclude: ExclusionTrie;

  constructor(
    private readonly options: ResolvedOptions,
    private readonly registry: FormatterRegistry,
  ) {
    this.indent = options.indent;
    this.exclude = makeExclusionTrie(options.exclude);
  }

  print(root: ConfigObject): string {
    this.printObject(root, [], ' '.repeat(this.options.rootIndent ? this.indent : 0));
    return this.out.join('');
  }

  /**
   * @param keyPath Path from the root, or null inside arrays where
   *                exclusion does not apply
   * @param spaces  Indentation of this object's entries
   */
  private printObject(obj: ConfigObject, keyPath: string[] | null, spaces: string): void {
    const entries = Object.entries(obj).filter(
      ([key]) => keyPath === null || !this.exclude.contains([...keyPath, key]),
    );
    if (entries.length === 0) {
      this.out.push('{}');
      return;
    }

    this.out.push('{\n');
    entries.forEach(([key, value], i) => {
      this.out.push(spaces, JSON.stringify(key), ': ');
      this.printElement(value, keyPath === null ? null : [...keyPath, key], spaces);
      if (i < entries.length - 1) {
        this.out.push(',\n');
      }
    });
    const closing = spaces.length <= this.indent ? '' : spaces.slice(0, spaces.length - this.indent);
    this.out.push('\n', closing, '}');
  }

  private printArray(arr: unknown[], spaces: string): void {
    if (arr.length === 0) {
      this.out.push('[]');
      return;
    }

    const moreSpaces = spaces + ' '.repeat(this.indent);
    const textLength = arr.reduce<number>((total, element) => total + this.textLength(element), 0);
    const multiline =
      arr.some(element => Array.isArray(element) || isPlainObject(element)) ||
      textLength + 2 * arr.length + moreSpaces.length > this.options.lineWidth;

    const prefix = multiline ? moreSpaces : '';
    const suffix = multiline ? '\n' : ' ';
    this.out.push('[', suffix);
    arr.forEach((element, i) => {
      this.out.push(prefix);
      this.printElement(element, null, moreSpaces);
      if (i < arr.length - 1) {
        this.out.push(',', suffix);
      }
    });
    this.out.push(suffix, multiline ? spaces : '', ']');
  }

  private printBytes(bytes: Uint8Array, spaces: string): void {
    if (bytes.length === 0) {
      this.out.push('[]');
      return;
    }

    const moreSpaces = spaces + ' '.repeat(this.indent);
    const multiline = 4 + 6 * bytes.length + moreSpaces.length > this.options.lineWidth;
    const prefix = multiline ? moreSpaces : '';
    const suffix = multiline ? '\n' : ' ';
    const items = Array.from(bytes, byte => `${prefix}"${hex(byte)}"`);
    this.out.push('[', suffix, items.join(',' + suffix), suffix, multiline ? spaces : '', ']');
  }

  private printElement(value: unknown, keyPath: string[] | null, spaces: string): void {
    if (value === null) {
      this.out.push('null');
    } else if (typeof value === 'boolean') {
      this.out.push(this.options.boolFormat ? String(value) : value ? '1' : '0');
    } else if (value instanceof Uint8Array) {
      if (this.options.bytesFormat === null) {
        this.printBytes(value, spaces);
      } else {
        this.out.push(JSON.stringify(new TextDecoder(this.options.bytesFormat).decode(value)));
      }
    } else if (typeof value === 'string') {
      this.out.push(JSON.stringify(value));
    } else if (typeof value === 'number' || typeof value === 'bigint') {
      this.out.push(String(value));
    } else if (Array.isArray(value)) {
      this.printArray(value, spaces);
    } else if (isPlainObject(value)) {
      this.printObject(value, keyPath, spaces + ' '.repeat(this.indent));
    } else {
      const formatted = this.registry.format(value, spaces, this.indent);
      if (formatted === undefined) {
        throw new ConfigurationError(`Don't know how to encode ${describeType(value)}`);
      }
      this.out.push(formatted);
    }
  }

  // Printed width of an array element, used to decide on line breaks.
  private textLength(value: unknown): number {
    if (typeof value === 'string') {
      return value.length;
    }
    if (value instanceof Uint8Array) {
      if (this.options.bytesFormat === null) {
        return 4 + 6 * value.length;
      }
      return new TextDecoder(this.options.bytesFormat).decode(value).length;
    }
    return 0;
  }
}

/**
 * Lay out a configuration tree as JSON text, without a trailing newline.
 */
export function prettyPrint(
  root: ConfigObject,
  options: PrettyPrintOptions = {},
  registry: FormatterRegistry = formatterRegistry,
): string {
  return new Printer(parsePrettyPrintOptions(options), registry).print(root);
}
