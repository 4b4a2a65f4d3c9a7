/**
 * Error Handler for ETL Pipeline
 * Classifies errors so table-level failures can be logged with a category
 */

import { ZodError } from 'zod';

export type ErrorCategory =
  | 'connection'
  | 'timeout'
  | 'deadlock'
  | 'constraint'
  | 'syntax'
  | 'file'
  | 'validation'
  | 'unknown';

export interface ErrorClassification {
  category: ErrorCategory;
  message: string;
  suggestion: string;
}

interface ErrorDetails {
  message: string;
  code?: string | number;
  number?: number;
  lineNumber?: number;
  procName?: string;
  stack?: string;
}

const FILE_ERROR_CODES = new Set(['ENOENT', 'EACCES', 'EISDIR', 'ENOTDIR', 'EMFILE']);

function readField(error: object, field: string): unknown {
  return Reflect.get(error, field);
}

function details(error: unknown): ErrorDetails {
  if (typeof error !== 'object' || error === null) {
    return { message: String(error) };
  }

  const message = readField(error, 'message');
  const code = readField(error, 'code');
  const number = readField(error, 'number');
  const lineNumber = readField(error, 'lineNumber');
  const procName = readField(error, 'procName');
  const stack = readField(error, 'stack');

  return {
    message: typeof message === 'string' ? message : String(error),
    code: typeof code === 'string' || typeof code === 'number' ? code : undefined,
    number: typeof number === 'number' ? number : undefined,
    lineNumber: typeof lineNumber === 'number' ? lineNumber : undefined,
    procName: typeof procName === 'string' && procName !== '' ? procName : undefined,
    stack: typeof stack === 'string' ? stack : undefined,
  };
}

/**
 * Extract a human readable message from any thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof ZodError) {
    return error.issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
  }
  return details(error).message;
}

/**
 * Classify an error by driver code, SQL Server error number or message
 */
export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof ZodError) {
    return {
      category: 'validation',
      message: errorMessage(error),
      suggestion: 'Check the source data against the column types',
    };
  }

  const { message, code, number } = details(error);
  const sqlNumber = number ?? (typeof code === 'number' ? code : undefined);

  if (typeof code === 'string' && FILE_ERROR_CODES.has(code)) {
    return {
      category: 'file',
      message,
      suggestion: 'Check the input directory and file names in configuration',
    };
  }

  // SQL Server connection errors
  if (
    code === 'ECONNRESET' ||
    code === 'ENOTFOUND' ||
    code === 'ECONNREFUSED' ||
    code === 'ESOCKET' ||
    code === 'ELOGIN' ||
    message.includes('Connection lost') ||
    message.includes('socket hang up') ||
    message.includes('Failed to connect')
  ) {
    return {
      category: 'connection',
      message: 'Database connection error',
      suggestion: 'Verify the SQL Server connection string and that the server is reachable',
    };
  }

  // SQL Server timeout errors
  if (
    sqlNumber === -2 ||
    code === 'ETIMEOUT' ||
    code === 'ETIMEDOUT' ||
    /timeout/i.test(message)
  ) {
    return {
      category: 'timeout',
      message: 'Query timeout',
      suggestion: 'Consider increasing requestTimeout or optimizing query',
    };
  }

  if (sqlNumber === 1205 || message.includes('deadlock')) {
    return {
      category: 'deadlock',
      message: 'Transaction deadlock detected',
      suggestion: 'Rerun the stage once concurrent sessions have finished',
    };
  }

  if (
    sqlNumber === 547 || // Foreign key constraint
    sqlNumber === 2627 || // Unique constraint
    sqlNumber === 2601 || // Duplicate key
    sqlNumber === 515 || // NULL into NOT NULL column
    message.includes('FOREIGN KEY constraint') ||
    message.includes('PRIMARY KEY constraint') ||
    message.includes('UNIQUE constraint')
  ) {
    return {
      category: 'constraint',
      message: 'Database constraint violation',
      suggestion: 'Check data integrity and fix source data',
    };
  }

  if (
    sqlNumber === 102 || // Syntax error
    sqlNumber === 156 || // Incorrect syntax
    sqlNumber === 207 || // Invalid column name
    sqlNumber === 208 || // Invalid object name
    message.includes('Incorrect syntax') ||
    message.includes('Invalid object name') ||
    message.includes('Invalid column name')
  ) {
    return {
      category: 'syntax',
      message: 'SQL syntax or schema error',
      suggestion: 'Run the setup stage or verify database schema',
    };
  }

  return {
    category: 'unknown',
    message,
    suggestion: 'Review error details and logs',
  };
}

/**
 * Format error for logging
 */
export function formatError(error: unknown): string {
  const classification = classifyError(error);
  const { code, number, lineNumber, procName, stack } = details(error);

  let formatted = `\n╔════════════════════════════════════════════════════════════════╗\n`;
  formatted += `║  ERROR DETAILS                                                 ║\n`;
  formatted += `╚════════════════════════════════════════════════════════════════╝\n`;
  formatted += `  Category:    ${classification.category}\n`;
  formatted += `  Message:     ${classification.message}\n`;
  formatted += `  Suggestion:  ${classification.suggestion}\n`;

  if (code !== undefined) {
    formatted += `  Error Code:  ${code}\n`;
  }

  if (number !== undefined) {
    formatted += `  SQL Number:  ${number}\n`;
  }

  if (lineNumber !== undefined) {
    formatted += `  Line:        ${lineNumber}\n`;
  }

  if (procName) {
    formatted += `  Procedure:   ${procName}\n`;
  }

  if (stack) {
    formatted += `\n  Stack Trace:\n`;
    formatted += `  ${stack.split('\n').join('\n  ')}\n`;
  }

  return formatted;
}
