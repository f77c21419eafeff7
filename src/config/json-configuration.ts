/**
 * json-configuration.ts - Load, edit and write back JSON configurations
 *
 * A configuration is read from a JSON file or copied from a plain object.
 * It can be written back to either kind of target, leaving out any key
 * paths the caller excludes:
 *
 *   const config = new JsonConfiguration('settings.json');
 *   config.checkPath('database').host = 'localhost';
 *   config.update(undefined, ['database', 'password']);
 *
 * Writing to a file that already exists moves the old file to
 * `<file>.bak` first.
 */

import * as fs from 'fs';
import { z } from 'zod';
import { createLogger } from '../logger.js';
import { ConfigurationError } from './errors.js';
import { makeExclusionTrie } from './exclusion.js';
import type { ExcludeItem, ExclusionTrie } from './exclusion.js';
import { prettyPrint } from './pretty-print.js';
import type { PrettyPrintOptions } from './pretty-print.js';
import { copySection, copyValue, describeType, isPlainObject } from './values.js';
import type { ConfigObject } from './values.js';

const logger = createLogger('json-configuration');

/** A JSON file path, or an object to copy from and write back into. */
export type ConfigurationSource = string | ConfigObject;

const rootSchema = z.record(z.string(), z.unknown());

function describeSource(source: ConfigurationSource): string {
  return typeof source === 'string' ? source : '<object>';
}

function readJsonFile(file: string): unknown {
  const text = fs.readFileSync(file, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Invalid JSON in ${file}`, { cause: error });
  }
}

function copyWithout(obj: ConfigObject, keyPath: string[], exclude: ExclusionTrie): ConfigObject {
  const copy: ConfigObject = {};
  for (const [key, value] of Object.entries(obj)) {
    const childPath = [...keyPath, key];
    if (exclude.contains(childPath)) {
      continue;
    }
    copy[key] = isPlainObject(value) ? copyWithout(value, childPath, exclude) : copyValue(value);
  }
  return copy;
}

export class JsonConfiguration {
  private source: ConfigurationSource;
  private tree: ConfigObject = {};

  constructor(source: ConfigurationSource) {
    this.source = source;
    this.reload();
  }

  /** The loaded configuration tree. Nested sections are plain objects. */
  get data(): ConfigObject {
    return this.tree;
  }

  /**
   * Replace the loaded data from the source, optionally switching to a
   * new source first. Sections and arrays of an object source are copied;
   * other values, such as dates or class instances, are shared.
   */
  reload(source?: ConfigurationSource): void {
    if (source !== undefined) {
      this.source = source;
    }
    const raw = typeof this.source === 'string' ? readJsonFile(this.source) : this.source;
    const parsed = rootSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Configuration in ${describeSource(this.source)} must be a JSON object, got ${describeType(raw)}`,
        { cause: parsed.error },
      );
    }
    this.tree = copySection(parsed.data);
    logger.debug({ source: describeSource(this.source), keys: Object.keys(this.tree).length }, 'Configuration loaded');
  }

  /**
   * Value at a nested key path, or undefined if any key is missing or
   * passes through something that is not a section.
   */
  get(...keys: string[]): unknown {
    let value: unknown = this.tree;
    for (const key of keys) {
      if (!isPlainObject(value)) {
        return undefined;
      }
      value = value[key];
    }
    return value;
  }

  /**
   * Make sure each key along the path names a section, creating empty
   * sections for missing keys.
   *
   * @returns The section at the end of the path (the root for no keys)
   */
  checkPath(...keys: string[]): ConfigObject {
    let section = this.tree;
    keys.forEach((key, i) => {
      const existing = section[key];
      if (existing === undefined) {
        const created: ConfigObject = {};
        section[key] = created;
        section = created;
      } else if (isPlainObject(existing)) {
        section = existing;
      } else {
        const where = keys.slice(0, i + 1).join('.');
        throw new ConfigurationError(`Cannot use "${where}" as a section: it holds a ${describeType(existing)}`);
      }
    });
    return section;
  }

  /**
   * Write the configuration back, by default to where it came from.
   *
   * @param target  File path or object; defaults to the current source.
   *                The source itself is not replaced.
   * @param exclude Top-level keys or key lists to leave out
   */
  update(target: ConfigurationSource = this.source, ...exclude: ExcludeItem[]): void {
    if (typeof target !== 'string') {
      const copy = copyWithout(this.tree, [], makeExclusionTrie(exclude));
      for (const key of Object.keys(target)) {
        delete target[key];
      }
      Object.assign(target, copy);
      logger.debug({ excluded: exclude.length }, 'Configuration written to object');
      return;
    }

    if (fs.existsSync(target)) {
      const backup = `${target}.bak`;
      fs.renameSync(target, backup);
      logger.info({ file: target, backup }, 'Backed up previous configuration');
    }
    this.pprint(target, { exclude: exclude.map(item => (typeof item === 'string' ? item : [...item])) });
    logger.debug({ file: target, excluded: exclude.length }, 'Configuration written to file');
  }

  /** Pretty-printed JSON text, without a trailing newline. */
  format(options?: PrettyPrintOptions): string {
    return prettyPrint(this.tree, options);
  }

  /** Write {@link format} output, plus a newline, to a file. */
  pprint(file: string, options?: PrettyPrintOptions): void {
    fs.writeFileSync(file, this.format(options) + '\n', 'utf-8');
  }

  toString(): string {
    return this.format();
  }
}
