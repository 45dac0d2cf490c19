import { Module } from '@nestjs/common';
import { ApplicationModule } from '../application/application.module';
import { VideoRequestConsumer } from './consumers/video-request.consumer';

@Module({
  imports: [ApplicationModule],
  providers: [VideoRequestConsumer],
})
export class ProcessingModule {}
