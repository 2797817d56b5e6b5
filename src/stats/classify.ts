// src/stats/classify.ts
import type { IncomingHttpHeaders } from 'http';

export type OperationCategory = 'read' | 'write' | 'other';

interface Rule {
  category: Exclude<OperationCategory, 'other'>;
  matches: (action: string, method: string) => boolean;
}

const actionContains =
  (...patterns: string[]) =>
  (action: string) =>
    patterns.some((p) => action.includes(p));

const methodIs =
  (...methods: string[]) =>
  (_action: string, method: string) =>
    methods.includes(method);

// Evaluated top to bottom; first match wins. Action names are checked before the method.
const RULES: readonly Rule[] = [
  { category: 'read', matches: actionContains('get', 'head') },
  {
    category: 'write',
    matches: actionContains(
      'put',
      'post',
      'delete',
      'copy',
      'create',
      'complete',
      'abort',
      'uploadpart',
      'list',
      'multipart'
    ),
  },
  { category: 'read', matches: methodIs('GET', 'HEAD') },
  { category: 'write', matches: methodIs('PUT', 'POST', 'DELETE') },
];

export function classifyOperation(action: string, method: string | undefined): OperationCategory {
  const a = action.toLowerCase();
  const m = (method ?? '').toUpperCase();
  return RULES.find((rule) => rule.matches(a, m))?.category ?? 'other';
}

const CONDITIONAL_HEADERS = [
  'if-match',
  'if-none-match',
  'if-modified-since',
  'if-unmodified-since',
  'x-amz-copy-source-if-match',
  'x-amz-copy-source-if-none-match',
  'x-amz-copy-source-if-modified-since',
  'x-amz-copy-source-if-unmodified-since',
] as const;

export function isConditional(headers: IncomingHttpHeaders): boolean {
  return CONDITIONAL_HEADERS.some((name) => {
    const value = headers[name];
    return Array.isArray(value) ? value.some(Boolean) : Boolean(value);
  });
}

/**
 * Billing increments for one request. A conditional write also bills a read, since the
 * precondition has to read the current object (or the copy source) first.
 */
export function billableOperations(
  action: string,
  method: string | undefined,
  headers: IncomingHttpHeaders
): OperationCategory[] {
  const category = classifyOperation(action, method);
  if (category === 'write' && isConditional(headers)) return ['write', 'read'];
  return [category];
}
