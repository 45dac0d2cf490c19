import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import configuration from './configuration';

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      cache: true,
      // Containers get their settings from the task definition, not a file
      ignoreEnvFile: process.env.NODE_ENV === 'production',
    }),
  ],
})
export class ConfigModule {}
