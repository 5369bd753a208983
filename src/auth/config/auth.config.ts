import { registerAs } from '@nestjs/config';

import { IsString, IsOptional } from 'class-validator';
import validateConfig from '../../utils/validate-config';
import { AuthConfig } from './auth-config.type';

class EnvironmentVariablesValidator {
  // Shared secret of the identity provider that signs access tokens
  @IsString()
  AUTH_JWT_SECRET: string;

  @IsString()
  @IsOptional()
  AUTH_JWT_ISSUER?: string;

  @IsString()
  @IsOptional()
  AUTH_JWT_AUDIENCE?: string;

  @IsString()
  @IsOptional()
  AUTH_JWT_ALLOWED_ALGORITHMS?: string;
}

export default registerAs<AuthConfig>('auth', () => {
  const validated = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    secret: validated.AUTH_JWT_SECRET,
    jwtIssuer: validated.AUTH_JWT_ISSUER,
    jwtAudience: validated.AUTH_JWT_AUDIENCE,
    jwtAllowedAlgorithms: validated.AUTH_JWT_ALLOWED_ALGORITHMS
      ? validated.AUTH_JWT_ALLOWED_ALGORITHMS.split(',').map((a) => a.trim())
      : ['HS256'],
  };
});
