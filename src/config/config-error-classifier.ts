/**
 * Configuration error classifier for waymark.
 *
 * Categorizes configuration loading errors and provides helpful user-facing
 * messages with actionable suggestions.
 */

import { ConfigValidationError } from './config-validator.js';

export type ConfigErrorType = 'syntax' | 'validation' | 'io' | 'unknown';

/**
 * Categorized error details for configuration loading failures.
 */
export interface ConfigErrorDetails {
  type: ConfigErrorType;
  /** User-friendly error message */
  userMessage: string;
  /** Message of the underlying error */
  technicalDetails: string;
  suggestions: string[];
}

/**
 * Error classifier for configuration loading failures.
 *
 * `JSON.parse` failures are syntax errors, schema failures are validation
 * errors, and errors carrying a Node.js errno code are I/O errors.
 */
export class ConfigErrorClassifier {
  /**
   * Classify and format a configuration loading error.
   *
   * @param error - The error thrown during config loading
   * @param configPath - The path to the config file
   */
  static classify(error: unknown, configPath: string): ConfigErrorDetails {
    const errorMessage =
      error instanceof Error ? error.message : String(error);
    const errorType = this.detectErrorType(error);

    return {
      type: errorType,
      userMessage: this.createUserMessage(errorType),
      technicalDetails: errorMessage,
      suggestions: this.createSuggestions(errorType, errorMessage, configPath),
    };
  }

  /**
   * Render classified details as the multi-line message commands print.
   */
  static format(details: ConfigErrorDetails, configPath: string): string {
    const lines = [
      details.userMessage,
      '',
      `Config file: ${configPath}`,
      '',
      'Technical details:',
      details.technicalDetails,
    ];

    if (details.suggestions.length > 0) {
      lines.push('', 'Suggestions:');
      for (const suggestion of details.suggestions) {
        lines.push(`  - ${suggestion}`);
      }
    }
    return lines.join('\n');
  }

  private static detectErrorType(error: unknown): ConfigErrorType {
    if (error instanceof SyntaxError) {
      return 'syntax';
    }
    if (error instanceof ConfigValidationError) {
      return 'validation';
    }
    if (
      error instanceof Error &&
      'code' in error &&
      typeof error.code === 'string' &&
      error.code.startsWith('E')
    ) {
      return 'io';
    }
    return 'unknown';
  }

  private static createUserMessage(type: ConfigErrorType): string {
    switch (type) {
      case 'syntax': {
        return 'Configuration file is not valid JSON';
      }
      case 'validation': {
        return 'Configuration file has invalid settings';
      }
      case 'io': {
        return 'Configuration file could not be read';
      }
      case 'unknown': {
        return 'Failed to load configuration file';
      }
    }
  }

  private static createSuggestions(
    type: ConfigErrorType,
    errorMessage: string,
    configPath: string
  ): string[] {
    switch (type) {
      case 'syntax': {
        return this.createSyntaxSuggestions(errorMessage);
      }
      case 'validation': {
        return [
          'Allowed keys: promptFile, catalogFile, targetLanguage, includeUnsafe, coverage',
          'Check that each value has the expected type (strings, boolean, arrays of patterns)',
        ];
      }
      case 'io': {
        return [
          `Check that ${configPath} exists and is a file`,
          'Check file permissions allow reading',
        ];
      }
      case 'unknown': {
        return ['Check the technical details above for the cause'];
      }
    }
  }

  private static createSyntaxSuggestions(errorMessage: string): string[] {
    const suggestions: string[] = [];

    if (errorMessage.includes('Unexpected end of JSON input')) {
      suggestions.push('Check for unclosed braces or brackets');
    } else if (errorMessage.includes('Unexpected token')) {
      suggestions.push(
        'Check for trailing commas after the last property or element',
        'Property names and strings must use double quotes'
      );
    } else {
      suggestions.push('Check for missing commas between properties');
    }

    suggestions.push('Comments are not allowed in JSON');
    return suggestions;
  }
}
