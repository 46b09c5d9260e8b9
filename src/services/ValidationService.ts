import path from 'path';
import { ValidationResult } from '../types/validation.js';

export class ValidationService {
  /**
   * Sanitizes user input by removing control characters
   * and normalizing whitespace
   */
  static sanitizeInput(input: string): string {
    if (!input) {
      return '';
    }

    // Trim whitespace
    let sanitized = input.trim();

    // Remove null bytes
    sanitized = sanitized.replace(/\0/g, '');

    // Remove control characters (except newlines and tabs which are handled by trim)
    sanitized = sanitized.replace(/[\x00-\x08\x0B-\x0C\x0E-\x1F\x7F]/g, '');

    // Normalize multiple spaces to single space
    sanitized = sanitized.replace(/\s+/g, ' ');

    if (sanitized.length > 2048) {
      sanitized = sanitized.substring(0, 2048);
    }

    return sanitized;
  }

  /**
   * Validates a container name against S3 bucket naming conventions
   *
   * Rules:
   * - Must be between 3 and 63 characters long
   * - Can consist only of lowercase letters, numbers, dots (.), and hyphens (-)
   * - Must begin and end with a letter or number
   * - Must not contain two adjacent periods
   * - Must not be formatted as an IP address (e.g., 192.168.5.4)
   * - Must not start with 'xn--' prefix
   * - Must not end with '-s3alias' suffix
   */
  static validateContainerName(containerName: string): ValidationResult {
    const sanitizedName = this.sanitizeInput(containerName);

    if (!sanitizedName) {
      return {
        isValid: false,
        error: 'Container name is required'
      };
    }

    if (sanitizedName !== containerName) {
      return {
        isValid: false,
        error: 'Container name must not contain whitespace or control characters'
      };
    }

    if (sanitizedName.length < 3 || sanitizedName.length > 63) {
      return {
        isValid: false,
        error: 'Container name must be between 3 and 63 characters long'
      };
    }

    const validCharsRegex = /^[a-z0-9.-]+$/;
    if (!validCharsRegex.test(sanitizedName)) {
      return {
        isValid: false,
        error: 'Container name can only contain lowercase letters, numbers, dots, and hyphens'
      };
    }

    const startsEndsWithAlphanumeric = /^[a-z0-9].*[a-z0-9]$/;
    if (!startsEndsWithAlphanumeric.test(sanitizedName)) {
      return {
        isValid: false,
        error: 'Container name must begin and end with a letter or number'
      };
    }

    if (sanitizedName.includes('..')) {
      return {
        isValid: false,
        error: 'Container name must not contain two adjacent periods'
      };
    }

    const ipAddressRegex = /^(\d{1,3}\.){3}\d{1,3}$/;
    if (ipAddressRegex.test(sanitizedName)) {
      return {
        isValid: false,
        error: 'Container name must not be formatted as an IP address'
      };
    }

    // Reserved for Punycode
    if (sanitizedName.startsWith('xn--')) {
      return {
        isValid: false,
        error: 'Container name must not start with "xn--" prefix'
      };
    }

    if (sanitizedName.endsWith('-s3alias')) {
      return {
        isValid: false,
        error: 'Container name must not end with "-s3alias" suffix'
      };
    }

    return { isValid: true };
  }

  /**
   * Validates an object key prefix (optional folder path)
   *
   * Rules:
   * - Can be empty (optional)
   * - Must not exceed 1024 characters
   * - Can contain letters, numbers, and special characters: ! - _ . * ' ( ) /
   * - Should not start with a forward slash
   */
  static validateKeyPrefix(keyPrefix: string): ValidationResult {
    const sanitizedPrefix = keyPrefix ? this.sanitizeInput(keyPrefix) : '';

    if (sanitizedPrefix === '') {
      return { isValid: true };
    }

    if (sanitizedPrefix.length > 1024) {
      return {
        isValid: false,
        error: 'Key prefix must not exceed 1024 characters'
      };
    }

    if (sanitizedPrefix.startsWith('/')) {
      return {
        isValid: false,
        error: 'Key prefix should not start with a forward slash'
      };
    }

    const validKeyRegex = /^[a-zA-Z0-9!_.*'()\/-]+$/;
    if (!validKeyRegex.test(sanitizedPrefix)) {
      return {
        isValid: false,
        error: 'Key prefix contains invalid characters. Allowed: letters, numbers, and ! - _ . * \' ( ) /'
      };
    }

    return { isValid: true };
  }

  /**
   * Validates that a local path resolves inside the given base directory.
   * Object names such as `../x` would otherwise write outside a download target.
   */
  static validatePathWithin(baseDir: string, candidate: string): ValidationResult {
    const relative = path.relative(path.resolve(baseDir), path.resolve(candidate));

    if (relative === '' || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      return {
        isValid: false,
        error: `Path '${candidate}' resolves outside directory '${baseDir}'`
      };
    }

    return { isValid: true };
  }
}
