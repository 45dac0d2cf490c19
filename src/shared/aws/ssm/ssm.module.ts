import { Module } from '@nestjs/common';
import { ConfigModule } from '../../../config/config.module';
import { SsmService } from './ssm.service';

@Module({
  imports: [ConfigModule],
  providers: [SsmService],
  exports: [SsmService],
})
export class SsmModule {}
