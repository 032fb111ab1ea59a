import { errorMessage } from '../errors.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export const VERBOSE_HINT = ' (use verbose=true for full details)';

export function toJsonText(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

export function textResult(text: string): ToolResult {
  return {
    content: [{ type: 'text', text }]
  };
}

export function errorResult(message: string): ToolResult {
  return {
    isError: true,
    content: [{ type: 'text', text: message }]
  };
}

/**
 * Pretty JSON, optionally preceded by a summary line. Encoding failures
 * become an error result naming what was being formatted.
 */
export function jsonResult(value: unknown, what: string, summary?: string): ToolResult {
  let text: string;
  try {
    text = toJsonText(value);
  } catch (error) {
    return errorResult(`Error formatting ${what}: ${errorMessage(error)}`);
  }
  return textResult(summary ? `${summary}\n\n${text}` : text);
}

export function listSummary(count: number, noun: string, verbose: boolean): string {
  return `Found ${count} ${noun}${verbose ? '' : VERBOSE_HINT}`;
}
