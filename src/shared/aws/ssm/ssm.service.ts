import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SSMClient, GetParameterCommand } from '@aws-sdk/client-ssm';
import { AppConfig } from '../../../config/configuration';
import { PinoLoggerService } from '../../logging/pino-logger.service';

interface CachedParameter {
  value: string | null;
  expiresAt: number;
}

/**
 * Reads parameters from SSM Parameter Store.
 *
 * Values are cached per instance for `ssm.cacheTtlMs`, so a warm worker does
 * not call SSM on every message while still picking up changes. A missing
 * parameter is cached as `null`.
 */
@Injectable()
export class SsmService implements OnModuleDestroy {
  private readonly client: SSMClient;
  private readonly cacheTtlMs: number;
  private readonly cache = new Map<string, CachedParameter>();

  constructor(
    private readonly configService: ConfigService<AppConfig, true>,
    private readonly logger: PinoLoggerService,
  ) {
    const awsConfig = this.configService.get('aws', { infer: true });
    const ssmConfig = this.configService.get('ssm', { infer: true });

    this.client = new SSMClient({
      region: awsConfig.region,
      ...(awsConfig.endpoint && { endpoint: awsConfig.endpoint }),
      ...(awsConfig.credentials && { credentials: awsConfig.credentials }),
    });

    this.cacheTtlMs = ssmConfig.cacheTtlMs;

    this.logger.setContext(SsmService.name);
  }

  /**
   * Returns the parameter value, or null when the parameter does not exist.
   */
  async getParameter(name: string, withDecryption = false): Promise<string | null> {
    const cached = this.cache.get(name);
    if (cached && cached.expiresAt > Date.now()) {
      this.logger.debug({ name }, 'Returning cached parameter');
      return cached.value;
    }

    let value: string | null;
    try {
      this.logger.debug({ name }, 'Fetching parameter from SSM Parameter Store');
      const response = await this.client.send(
        new GetParameterCommand({ Name: name, WithDecryption: withDecryption }),
      );
      value = response.Parameter?.Value ?? null;
    } catch (error) {
      if (
        error &&
        typeof error === 'object' &&
        'name' in error &&
        error.name === 'ParameterNotFound'
      ) {
        this.logger.warn({ name }, 'Parameter not found');
        value = null;
      } else {
        this.logger.error({ name, error }, 'Failed to retrieve parameter');
        throw error;
      }
    }

    this.cache.set(name, { value, expiresAt: Date.now() + this.cacheTtlMs });
    return value;
  }

  clearCache(): void {
    this.cache.clear();
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
