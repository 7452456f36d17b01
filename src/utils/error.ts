import { ZodError } from 'zod';
import { ERROR_CODES, ErrorKind, MobileDeviceError } from '../types';

export interface ToolErrorData {
  kind: ErrorKind;
  tool: string;
}

/**
 * The JSON-RPC error a failed tool call is answered with. The protocol layer
 * copies `code`, `message` and `data` into the response.
 */
export class ToolCallError extends Error {
  readonly code: number;
  readonly data: ToolErrorData;

  constructor(code: number, message: string, data: ToolErrorData) {
    super(message);
    this.name = 'ToolCallError';
    this.code = code;
    this.data = data;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'syscall' in error && typeof error.syscall === 'string';
}

export function formatIssues(error: ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'arguments'}: ${issue.message}`).join('; ');
}

// Classify any failure into the error taxonomy
export function classifyError(error: unknown): { kind: ErrorKind; message: string } {
  if (error instanceof MobileDeviceError) {
    return { kind: error.kind, message: formatErrorForResponse(error) };
  }
  if (error instanceof ZodError) {
    return { kind: 'validation', message: `Invalid arguments: ${formatIssues(error)}` };
  }
  if (isErrnoException(error)) {
    return { kind: 'io', message: error.message };
  }
  return { kind: 'internal', message: formatErrorForResponse(error) };
}

export function toToolCallError(error: unknown, tool: string): ToolCallError {
  const { kind, message } = classifyError(error);
  return new ToolCallError(ERROR_CODES[kind], message, { kind, tool });
}

// Format error for MCP response
export function formatErrorForResponse(error: unknown): string {
  if (error instanceof MobileDeviceError) {
    let message = error.message;

    if (error.suggestion) {
      message += `\n\nSuggestion: ${error.suggestion}`;
    }

    return message;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
