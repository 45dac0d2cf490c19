import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { z } from 'zod';
import { AppConfig } from '../../../config/configuration';
import { ExtractionLimitsPort } from '../../../application/ports/output/extraction-limits.port';
import {
  ExtractionLimits,
  createExtractionLimits,
} from '../../../domain/value-objects/extraction-limits.vo';
import { SsmService } from '../../../shared/aws/ssm/ssm.service';
import { ConfigurationError } from '../../../shared/errors';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

const wholeNumber = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a whole number')
  .transform(Number);

const maxFramesValue = wholeNumber;
const timeoutValue = wholeNumber.refine((value) => value > 0, 'must be greater than zero');

/**
 * Parameter Store Limits Adapter
 * Implements ExtractionLimitsPort.
 *
 * Frame cap and timeout are read from SSM when a parameter name is
 * configured; an absent parameter keeps the environment default. The low disk
 * threshold always comes from the environment.
 */
@Injectable()
export class ParameterStoreLimitsAdapter implements ExtractionLimitsPort {
  constructor(
    private readonly ssmService: SsmService,
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    this.logger.setContext(ParameterStoreLimitsAdapter.name);
  }

  async resolve(): Promise<ExtractionLimits> {
    const ssmConfig = this.configService.get('ssm', { infer: true });
    const defaults = this.configService.get('extraction', { infer: true });

    const maxFrames =
      (await this.readParameter(ssmConfig.maxFramesParameter, maxFramesValue)) ??
      defaults.maxFrames;
    const timeoutMs =
      (await this.readParameter(ssmConfig.timeoutParameter, timeoutValue)) ??
      defaults.timeoutMs;

    const limits = createExtractionLimits({
      maxFrames,
      timeoutMs,
      lowDiskThresholdBytes: defaults.lowDiskThresholdBytes,
    });

    this.logger.debug({ ...limits }, 'Resolved extraction limits');
    return limits;
  }

  private async readParameter(
    name: string | undefined,
    schema: z.ZodType<number, z.ZodTypeDef, string>,
  ): Promise<number | undefined> {
    if (!name) {
      return undefined;
    }

    const raw = await this.ssmService.getParameter(name);
    if (raw === null) {
      return undefined;
    }

    const result = schema.safeParse(raw);
    if (!result.success) {
      const reason = result.error.issues.map((issue) => issue.message).join(', ');
      throw new ConfigurationError(`Invalid value for parameter ${name}: "${raw}" ${reason}`, {
        details: { parameter: name, value: raw },
      });
    }

    return result.data;
  }
}
