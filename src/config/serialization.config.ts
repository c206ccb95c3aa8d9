import { registerAs } from '@nestjs/config';
import { IsInt, Max, Min } from 'class-validator';
import { Type } from 'class-transformer';
import { validateConfig } from './config-validation';

/**
 * Serializer output settings
 */
export class SerializationConfig {
  @Type(() => Number)
  @IsInt()
  @Min(0)
  @Max(8)
  indent!: number;
}

export default registerAs('serialization', (): SerializationConfig => {
  const rawConfig = {
    indent: parseInt(process.env.SERIALIZATION_INDENT || '0', 10),
  };
  
  return validateConfig(rawConfig, 'serialization', SerializationConfig);
});
