import { validateSync, ValidationError } from 'class-validator';
import { plainToInstance } from 'class-transformer';
import { Logger } from '@nestjs/common';

const logger = new Logger('ConfigValidation');

/**
 * Convert a raw configuration section into its settings class and validate it
 * Keys without validation rules are dropped; nested violations are reported by dotted path
 */
export function validateConfig<T extends object>(
  config: Record<string, unknown>,
  sectionKey: string,
  validationClass: new () => T,
): T {
  const settings = plainToInstance(validationClass, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(settings, {
    whitelist: true,
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const violations = describeViolations(errors);
    logger.error(`Configuration validation failed for ${sectionKey} (${violations.length} violations)`);
    throw new Error(`Invalid configuration for ${sectionKey}: ${violations.join('; ')}`);
  }

  return settings;
}

/**
 * One `path: constraint, constraint` line per invalid property, children included
 */
export function describeViolations(errors: ValidationError[], parentPath = ''): string[] {
  return errors.flatMap((error) => {
    const path = parentPath ? `${parentPath}.${error.property}` : error.property;
    const own = error.constraints ? [`${path}: ${Object.values(error.constraints).join(', ')}`] : [];
    return [...own, ...describeViolations(error.children ?? [], path)];
  });
}
