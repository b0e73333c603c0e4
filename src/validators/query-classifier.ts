/**
 * Query Classifier
 * Keyword-based statement classification and safety checks
 */

import { QueryTypeMismatchError } from '../errors.js';
import type { QueryType } from '../types.js';

// Order matters: "DESC " carries a trailing space so it only matches the
// DESCRIBE shorthand and never a longer keyword.
const TYPE_PREFIXES: ReadonlyArray<{ prefix: string; type: QueryType }> = [
  { prefix: 'SELECT', type: 'SELECT' },
  { prefix: 'INSERT', type: 'INSERT' },
  { prefix: 'UPDATE', type: 'UPDATE' },
  { prefix: 'DELETE', type: 'DELETE' },
  { prefix: 'ALTER', type: 'ALTER' },
  { prefix: 'SHOW', type: 'SHOW' },
  { prefix: 'DESCRIBE', type: 'DESCRIBE' },
  { prefix: 'DESC ', type: 'DESCRIBE' },
  { prefix: 'EXPLAIN', type: 'EXPLAIN' },
  { prefix: 'DROP', type: 'DROP' },
  { prefix: 'TRUNCATE', type: 'TRUNCATE' },
  { prefix: 'CREATE', type: 'CREATE' },
  { prefix: 'GRANT', type: 'GRANT' },
  { prefix: 'REVOKE', type: 'REVOKE' },
  { prefix: 'SET', type: 'SET' },
  { prefix: 'USE', type: 'USE' },
];

const READ_ONLY_TYPES: ReadonlySet<QueryType> = new Set(['SELECT', 'SHOW', 'DESCRIBE', 'EXPLAIN']);

// ALTER is absent on purpose: it is gated by its own execution mode.
const DANGEROUS_TYPES: ReadonlySet<QueryType> = new Set(['DROP', 'TRUNCATE', 'CREATE', 'GRANT', 'REVOKE']);

const DANGEROUS_PREFIXES = ['DROP', 'ALTER', 'TRUNCATE', 'CREATE', 'GRANT', 'REVOKE'];

const SENSITIVE_PATTERNS = [
  'SHOW GRANTS',
  'MYSQL.USER',
  'USER_PRIVILEGES',
  'SHOW PROCESSLIST',
  'SHOW FULL PROCESSLIST',
];

const ALTER_BLOCKED_PHRASES = [
  'DROP DATABASE',
  'DROP SCHEMA',
  'TRUNCATE',
  'CREATE DATABASE',
  'GRANT',
  'REVOKE',
];

export class QueryClassifier {
  /**
   * Detects the statement type from its leading keyword.
   * Never throws; anything unrecognized is UNKNOWN.
   */
  static detectType(sql: string): QueryType {
    const normalized = this.normalize(sql);

    for (const { prefix, type } of TYPE_PREFIXES) {
      if (normalized.startsWith(prefix)) {
        return type;
      }
    }

    return 'UNKNOWN';
  }

  static isReadOnlyType(type: QueryType): boolean {
    return READ_ONLY_TYPES.has(type);
  }

  static isDangerousType(type: QueryType): boolean {
    return DANGEROUS_TYPES.has(type);
  }

  /**
   * Text-based variant of the dangerous check. Unlike isDangerousType it
   * also flags a leading ALTER.
   */
  static isDangerousText(sql: string): boolean {
    const normalized = this.normalize(sql);
    return DANGEROUS_PREFIXES.some(prefix => normalized.startsWith(prefix));
  }

  /**
   * Flags statements touching credentials or connection metadata anywhere
   * in the text, subqueries included.
   */
  static isSensitiveText(sql: string): boolean {
    const upper = sql.toUpperCase();
    return SENSITIVE_PATTERNS.some(pattern => upper.includes(pattern));
  }

  /**
   * Returns the first phrase that stays forbidden even behind a leading
   * ALTER keyword.
   */
  static findAlterBlockedPhrase(sql: string): string | undefined {
    const normalized = this.normalize(sql);
    return ALTER_BLOCKED_PHRASES.find(phrase => normalized.includes(phrase));
  }

  /**
   * Throws QueryTypeMismatchError unless the detected type is one of `allowed`.
   */
  static validateType(sql: string, ...allowed: QueryType[]): void {
    const detected = this.detectType(sql);

    if (allowed.includes(detected)) {
      return;
    }

    throw new QueryTypeMismatchError(allowed.join('/'), detected);
  }

  private static normalize(sql: string): string {
    return sql.trim().toUpperCase();
  }
}
