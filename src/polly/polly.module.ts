import { Logger, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { PollyClient } from '@aws-sdk/client-polly';
import { readPositiveInt } from '../config/dialogue.config';
import { POLLY_CLIENT } from './polly.constants';

export function createPollyClient(configService: ConfigService): PollyClient {
  const region = configService.get<string>('AWS_REGION') || 'us-east-1';
  const accessKeyId = configService.get<string>('AWS_ACCESS_KEY_ID');
  const secretAccessKey = configService.get<string>('AWS_SECRET_ACCESS_KEY');
  const maxAttempts = readPositiveInt(configService, 'POLLY_MAX_ATTEMPTS', 3);

  if (!accessKeyId || !secretAccessKey) {
    new Logger('PollyModule').warn('AWS credentials missing; Polly calls will fail until they are set');
    return new PollyClient({
      region,
      maxAttempts,
      credentials: async () => {
        throw new Error('AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY must be set for Polly');
      },
    });
  }

  return new PollyClient({
    region,
    maxAttempts,
    credentials: { accessKeyId, secretAccessKey },
  });
}

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: POLLY_CLIENT,
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => createPollyClient(configService),
    },
  ],
  exports: [POLLY_CLIENT],
})
export class PollyModule {}
