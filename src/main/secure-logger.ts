/**
 * Secure Logger Utility
 *
 * Keeps account identities, tokens and credentials out of the console.
 * Debug output is opt-in through config or DEBUG_TRANSFERS=true.
 */

class SecureLogger {
  private static readonly SENSITIVE_KEY_PATTERNS = [
    /password/i,
    /secret/i,
    /token/i,
    /authorization/i,
    /bearer/i,
    /credential/i,
    /identity/i
  ];

  // Inline "token=abc" or "secret: abc" fragments inside free text
  private static readonly INLINE_SECRET_PATTERN = /\b(token|secret|password|identity)(\s*[:=]\s*)(\S+)/gi;

  private static debugEnabled = process.env.DEBUG_TRANSFERS === 'true';

  static setDebug(enabled: boolean): void {
    this.debugEnabled = enabled || process.env.DEBUG_TRANSFERS === 'true';
  }

  static isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  /**
   * Redacts sensitive information from a log argument
   */
  static redactSensitive(value: unknown): unknown {
    if (typeof value === 'string') {
      return value.replace(this.INLINE_SECRET_PATTERN, '$1$2[REDACTED]');
    }

    if (value instanceof Error) {
      return value;
    }

    if (Array.isArray(value)) {
      return value.map(item => this.redactSensitive(item));
    }

    if (typeof value === 'object' && value !== null) {
      const redacted: Record<string, unknown> = {};
      for (const [key, val] of Object.entries(value)) {
        const sensitiveKey = this.SENSITIVE_KEY_PATTERNS.some(pattern => pattern.test(key));
        redacted[key] = sensitiveKey ? '[REDACTED]' : this.redactSensitive(val);
      }
      return redacted;
    }

    return value;
  }

  static log(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'production') {
      return;
    }
    console.log(this.redactSensitive(message), ...args.map(arg => this.redactSensitive(arg)));
  }

  static debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'production' || !this.debugEnabled) {
      return;
    }
    console.debug('[DEBUG]', this.redactSensitive(message), ...args.map(arg => this.redactSensitive(arg)));
  }

  static warn(message: string, ...args: unknown[]): void {
    console.warn(this.redactSensitive(message), ...args.map(arg => this.redactSensitive(arg)));
  }

  static error(message: string, ...args: unknown[]): void {
    console.error(this.redactSensitive(message), ...args.map(arg => this.redactSensitive(arg)));
  }
}

export default SecureLogger;
