import { errorMessage, SerializationError } from './errors.js';

export function prettyPrint(value: unknown): string {
  let text: string | undefined;
  try {
    text = JSON.stringify(value, null, 2);
  } catch (error) {
    throw new SerializationError(`could not serialize value: ${errorMessage(error)}`, error);
  }
  if (text === undefined) {
    throw new SerializationError(`value of type ${typeof value} has no JSON representation`);
  }
  return text;
}

/** Re-indents a JSON document received as text. */
export function prettyPrintJson(raw: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SerializationError(`response body is not valid JSON: ${errorMessage(error)}`, error);
  }
  return prettyPrint(parsed);
}
