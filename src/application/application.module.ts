import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';

// Use Cases
import { ProcessVideoUseCase } from './use-cases';

// Application services
import { FrameExtractorService } from './services/frame-extractor.service';

/**
 * Application Module
 * Contains the use case and application services
 *
 * Use cases depend on output ports (interfaces) through injection tokens.
 * The implementations (adapters) are provided by the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [FrameExtractorService, ProcessVideoUseCase],
  exports: [
    // Export use cases so they can be used by driving adapters (consumers)
    ProcessVideoUseCase,
    // Consumers resolve limits before invoking the use case
    InfrastructureModule,
  ],
})
export class ApplicationModule {}
