import stringify from 'fast-json-stable-stringify';
import { CodecError } from './db-errors.js';
import { StructuredValueSchema, type StructuredValue } from '../types.js';

/**
 * Converts the conversation/steps values to and from their stored text form.
 * decode(encode(x)) must deep-equal x.
 */
export interface StructuredValueCodec {
  encode(value: StructuredValue): string;
  decode(text: string): StructuredValue;
}

export const jsonCodec: StructuredValueCodec = {
  encode(value) {
    return stringify(value);
  },

  decode(text) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new CodecError(error instanceof Error ? error.message : String(error));
    }
    // Older writers stored an absent list as the JSON text `null`
    if (parsed === null) {
      return [];
    }
    const result = StructuredValueSchema.safeParse(parsed);
    if (!result.success) {
      throw new CodecError('stored value is not a list or mapping');
    }
    return result.data;
  },
};
