/**
 * PHP-serialize integrity check
 *
 * A literal URL replacement inside `s:<n>:"..."` leaves <n> stale whenever
 * the two URLs differ in length, and PHP then refuses to unserialize the
 * value. WP-CLI search-replace rewrites lengths; the SQL fallback does not.
 */

import { errorMessage } from '@wp-promote/shared';

export interface SerializedCheck {
  valid: boolean;
  error?: string;
}

const SERIALIZED_START = /^(?:[aOs]:\d+:|[bid]:[^;]*;|N;)/;

export function looksSerialized(value: string): boolean {
  return SERIALIZED_START.test(value);
}

const byte = (char: string): number => char.charCodeAt(0);

class Reader {
  pos = 0;

  constructor(private readonly bytes: Buffer) {}

  get length(): number {
    return this.bytes.length;
  }

  next(): string {
    if (this.pos >= this.bytes.length) {
      throw new Error('unexpected end of value');
    }
    return String.fromCharCode(this.bytes[this.pos++]);
  }

  expect(char: string): void {
    if (this.bytes[this.pos] !== byte(char)) {
      throw new Error(`expected '${char}' at byte ${this.pos}`);
    }
    this.pos++;
  }

  /** Text up to (not including) the delimiter; consumes the delimiter. */
  until(char: string): string {
    const end = this.bytes.indexOf(byte(char), this.pos);
    if (end === -1) {
      throw new Error(`missing '${char}' after byte ${this.pos}`);
    }
    const text = this.bytes.toString('utf-8', this.pos, end);
    this.pos = end + 1;
    return text;
  }

  count(char: string): number {
    const text = this.until(char);
    if (!/^\d+$/.test(text)) {
      throw new Error(`invalid length '${text}' before byte ${this.pos}`);
    }
    return Number(text);
  }

  skip(n: number): void {
    if (this.pos + n > this.bytes.length) {
      throw new Error(`length ${n} runs past the end of the value at byte ${this.pos}`);
    }
    this.pos += n;
  }
}

function readValue(reader: Reader): void {
  const type = reader.next();
  if (type === 'N') {
    reader.expect(';');
    return;
  }
  reader.expect(':');
  switch (type) {
    case 'b':
    case 'i':
    case 'd':
      reader.until(';');
      return;
    case 's': {
      const length = reader.count(':');
      const start = reader.pos + 1;
      reader.expect('"');
      reader.skip(length);
      try {
        reader.expect('"');
        reader.expect(';');
      } catch {
        throw new Error(`string length ${length} at byte ${start} does not match its payload`);
      }
      return;
    }
    case 'a': {
      const entries = reader.count(':');
      reader.expect('{');
      for (let i = 0; i < entries * 2; i++) readValue(reader);
      reader.expect('}');
      return;
    }
    case 'O': {
      const classLength = reader.count(':');
      reader.expect('"');
      reader.skip(classLength);
      reader.expect('"');
      reader.expect(':');
      const properties = reader.count(':');
      reader.expect('{');
      for (let i = 0; i < properties * 2; i++) readValue(reader);
      reader.expect('}');
      return;
    }
    default:
      throw new Error(`unknown type '${type}' before byte ${reader.pos}`);
  }
}

export function checkSerialized(value: string): SerializedCheck {
  const reader = new Reader(Buffer.from(value, 'utf-8'));
  try {
    readValue(reader);
    if (reader.pos !== reader.length) {
      return { valid: false, error: `trailing data at byte ${reader.pos}` };
    }
    return { valid: true };
  } catch (error) {
    return { valid: false, error: errorMessage(error) };
  }
}
