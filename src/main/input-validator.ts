/**
 * Input validation for configuration values read from disk.
 */

export class ValidationError extends Error {
  constructor(message: string, public field?: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class InputValidator {
  private static readonly PATTERNS = {
    // eslint-disable-next-line no-control-regex
    FILE_PATH: /^[^<>"|?*\x00-\x1f]*$/,
    // Single path component
    FILENAME: /^[^/\\<>:"|?*\x00-\x1f]+$/,
    IDENTIFIER: /^[A-Za-z0-9][A-Za-z0-9._-]*$/
  };

  private static readonly CONSTRAINTS = {
    MAX_STRING_LENGTH: 1000,
    MAX_FILENAME_LENGTH: 255,
    MAX_PATH_LENGTH: 4096
  };

  static validateString(
    value: unknown,
    fieldName: string,
    options: {
      minLength?: number;
      maxLength?: number;
      pattern?: RegExp;
    } = {}
  ): string {
    const { minLength = 1, maxLength = this.CONSTRAINTS.MAX_STRING_LENGTH, pattern } = options;

    if (typeof value !== 'string') {
      throw new ValidationError(`${fieldName} must be a string`, fieldName);
    }

    const trimmed = value.trim();
    if (trimmed.length < minLength) {
      throw new ValidationError(`${fieldName} cannot be empty`, fieldName);
    }

    if (trimmed.length > maxLength) {
      throw new ValidationError(`${fieldName} cannot exceed ${maxLength} characters`, fieldName);
    }

    if (pattern && !pattern.test(trimmed)) {
      throw new ValidationError(`${fieldName} contains invalid characters`, fieldName);
    }

    return trimmed;
  }

  /**
   * Validates a string that may also be null
   */
  static validateNullableString(
    value: unknown,
    fieldName: string,
    validate: (value: unknown, fieldName: string) => string
  ): string | null {
    if (value === null) {
      return null;
    }
    return validate(value, fieldName);
  }

  static validatePath(value: unknown, fieldName: string = 'path'): string {
    const filePath = this.validateString(value, fieldName, {
      maxLength: this.CONSTRAINTS.MAX_PATH_LENGTH,
      pattern: this.PATTERNS.FILE_PATH
    });

    if (filePath.split(/[/\\]/).includes('..')) {
      throw new ValidationError(`${fieldName} cannot contain '..' segments`, fieldName);
    }

    return filePath;
  }

  static validateFilename(value: unknown, fieldName: string = 'filename'): string {
    const filename = this.validateString(value, fieldName, {
      maxLength: this.CONSTRAINTS.MAX_FILENAME_LENGTH,
      pattern: this.PATTERNS.FILENAME
    });

    if (filename === '.' || filename === '..') {
      throw new ValidationError(`${fieldName} is not a valid filename`, fieldName);
    }

    return filename;
  }

  static validateIdentifier(value: unknown, fieldName: string = 'identifier'): string {
    return this.validateString(value, fieldName, {
      maxLength: this.CONSTRAINTS.MAX_FILENAME_LENGTH,
      pattern: this.PATTERNS.IDENTIFIER
    });
  }

  static validateBoolean(value: unknown, fieldName: string): boolean {
    if (typeof value !== 'boolean') {
      throw new ValidationError(`${fieldName} must be true or false`, fieldName);
    }
    return value;
  }
}
