/**
 * Gate descriptors
 *
 * A descriptor is a constructor-call string such as
 * `CPMG(num_pi_pair=2, total_duration_ns=1000, pi_gate='X')`. Descriptors
 * are parsed into a name and literal arguments; nothing is evaluated.
 * Only number and string literals are accepted.
 */

import type { ExtensionParamValue } from '@qcis-bridge/circuit-core';
import { MalformedDescriptorError } from './errors';

/**
 * Parsed descriptor
 */
export interface Descriptor {
  name: string;
  args: DescriptorArgs;
}

/**
 * Render a descriptor from a constructor name and keyword parameters
 */
export function formatDescriptor(
  name: string,
  params: Readonly<Record<string, ExtensionParamValue>>
): string {
  const args = Object.entries(params).map(([key, value]) => `${key}=${formatValue(value)}`);
  return `${name}(${args.join(', ')})`;
}

function formatValue(value: ExtensionParamValue): string {
  if (typeof value === 'number') {
    return String(value);
  }
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

/**
 * Typed access to descriptor arguments. Each parameter is looked up by
 * keyword first, then by position.
 */
export class DescriptorArgs {
  private readonly positional: readonly ExtensionParamValue[];
  private readonly keywords: ReadonlyMap<string, ExtensionParamValue>;
  private readonly source: string;

  constructor(
    positional: readonly ExtensionParamValue[],
    keywords: ReadonlyMap<string, ExtensionParamValue>,
    source: string
  ) {
    this.positional = positional;
    this.keywords = keywords;
    this.source = source;
  }

  /**
   * Arguments from a keyword record, as found in JSON
   */
  static fromRecord(params: Readonly<Record<string, ExtensionParamValue>>, source: string): DescriptorArgs {
    return new DescriptorArgs([], new Map(Object.entries(params)), source);
  }

  /**
   * Reject keywords outside `names` and surplus positional arguments
   */
  expectOnly(names: readonly string[]): this {
    if (this.positional.length > names.length) {
      throw new MalformedDescriptorError(
        this.source,
        `expected at most ${names.length} arguments, got ${this.positional.length}`
      );
    }
    for (const key of this.keywords.keys()) {
      const index = names.indexOf(key);
      if (index < 0) {
        throw new MalformedDescriptorError(this.source, `unexpected argument ${key}`);
      }
      if (index < this.positional.length) {
        throw new MalformedDescriptorError(this.source, `argument ${key} given twice`);
      }
    }
    return this;
  }

  number(name: string, index: number, defaultValue?: number): number {
    const value = this.lookup(name, index, defaultValue);
    if (typeof value !== 'number') {
      throw new MalformedDescriptorError(this.source, `argument ${name} must be a number`);
    }
    return value;
  }

  string(name: string, index: number, defaultValue?: string): string {
    const value = this.lookup(name, index, defaultValue);
    if (typeof value !== 'string') {
      throw new MalformedDescriptorError(this.source, `argument ${name} must be a string`);
    }
    return value;
  }

  private lookup(
    name: string,
    index: number,
    defaultValue: ExtensionParamValue | undefined
  ): ExtensionParamValue {
    const value = this.keywords.get(name) ?? this.positional[index] ?? defaultValue;
    if (value === undefined) {
      throw new MalformedDescriptorError(this.source, `missing argument ${name}`);
    }
    return value;
  }
}

// ============================================================================
// Parser
// ============================================================================

const HEAD = /^\s*((?:[A-Za-z_]\w*\.)*)([A-Za-z_]\w*)\s*\(/;
const NUMBER = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const IDENT = /^[A-Za-z_]\w*/;

/**
 * Parse a descriptor string. A dotted namespace before the constructor
 * name is accepted and dropped.
 *
 * @throws MalformedDescriptorError on anything but a flat call with
 *   literal arguments
 */
export function parseDescriptor(text: string): Descriptor {
  const head = HEAD.exec(text);
  if (!head) {
    throw new MalformedDescriptorError(text, 'expected NAME(...)');
  }
  const name = head[2];
  const positional: ExtensionParamValue[] = [];
  const keywords = new Map<string, ExtensionParamValue>();

  let pos = head[0].length;
  const skipSpace = (): void => {
    while (pos < text.length && /\s/.test(text[pos])) pos++;
  };

  skipSpace();
  if (text[pos] === ')') {
    pos++;
  } else {
    for (;;) {
      skipSpace();
      let key: string | undefined;
      const ident = IDENT.exec(text.slice(pos));
      if (ident) {
        const after = text.slice(pos + ident[0].length).match(/^\s*=/);
        if (!after) {
          throw new MalformedDescriptorError(text, `unexpected name ${ident[0]}`);
        }
        key = ident[0];
        pos += ident[0].length + after[0].length;
        skipSpace();
      }

      const [value, length] = readLiteral(text, pos);
      pos += length;

      if (key === undefined) {
        if (keywords.size > 0) {
          throw new MalformedDescriptorError(text, 'positional argument after keyword argument');
        }
        positional.push(value);
      } else {
        if (keywords.has(key)) {
          throw new MalformedDescriptorError(text, `argument ${key} given twice`);
        }
        keywords.set(key, value);
      }

      skipSpace();
      if (text[pos] === ',') {
        pos++;
        skipSpace();
        // trailing comma
        if (text[pos] === ')') {
          pos++;
          break;
        }
        continue;
      }
      if (text[pos] === ')') {
        pos++;
        break;
      }
      throw new MalformedDescriptorError(text, `unexpected character at ${pos}`);
    }
  }

  skipSpace();
  if (pos !== text.length) {
    throw new MalformedDescriptorError(text, 'trailing characters after closing parenthesis');
  }
  return { name, args: new DescriptorArgs(positional, keywords, text) };
}

function readLiteral(text: string, pos: number): [ExtensionParamValue, number] {
  const quote = text[pos];
  if (quote === "'" || quote === '"') {
    let out = '';
    let i = pos + 1;
    while (i < text.length && text[i] !== quote) {
      if (text[i] === '\\' && i + 1 < text.length) {
        i++;
      }
      out += text[i];
      i++;
    }
    if (i >= text.length) {
      throw new MalformedDescriptorError(text, 'unterminated string');
    }
    return [out, i + 1 - pos];
  }
  const num = NUMBER.exec(text.slice(pos));
  if (!num) {
    throw new MalformedDescriptorError(text, `expected a literal at ${pos}`);
  }
  return [Number(num[0]), num[0].length];
}
