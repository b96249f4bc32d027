import {
  CallHandler,
  ExecutionContext,
  Inject,
  Injectable,
  Logger,
  NestInterceptor,
  ServiceUnavailableException,
  UnauthorizedException,
} from '@nestjs/common';
import { IncomingHttpHeaders } from 'http';
import { Response } from 'express';
import { Observable } from 'rxjs';
import { TokenBucketStore } from '../services/token-bucket-store.service';
import { ICredentialStore } from '../interfaces/credential-store.interface';
import { KeyAdmissionConfig } from '../interfaces/config.interface';
import { RateLimitExceededException } from '../exceptions/rate-limit-exceeded.exception';
import { SKIP_ADMISSION_KEY } from '../decorators/skip-admission.decorator';
import {
  DEFAULT_API_KEY_HEADER,
  KEY_ADMISSION_CONFIG,
  KEY_ADMISSION_CREDENTIAL_STORE,
} from '../utils/constants';
import { maskKey } from '../utils/mask-key';

/**
 * Read the API key from request headers.
 * Node joins a repeated header into one comma-separated value; the first one wins.
 */
export function extractApiKey(
  headers: IncomingHttpHeaders,
  headerName: string,
): string | null {
  const value = headers[headerName.toLowerCase()];
  const raw = Array.isArray(value) ? value[0] : value;
  if (!raw) {
    return null;
  }
  const key = raw.split(',')[0].trim();
  return key ? key : null;
}

/**
 * Admission gate for HTTP routes.
 * Checks, in order: the API key is present, the key is valid, the key's bucket has a token.
 * Only then is the route handler invoked.
 */
@Injectable()
export class AdmissionInterceptor implements NestInterceptor {
  private readonly logger = new Logger(AdmissionInterceptor.name);
  private readonly headerName: string;

  constructor(
    @Inject(KEY_ADMISSION_CONFIG) config: KeyAdmissionConfig,
    @Inject(KEY_ADMISSION_CREDENTIAL_STORE)
    private readonly credentialStore: ICredentialStore,
    private readonly bucketStore: TokenBucketStore,
  ) {
    this.headerName = config.headerName || DEFAULT_API_KEY_HEADER;
  }

  async intercept(
    context: ExecutionContext,
    next: CallHandler,
  ): Promise<Observable<unknown>> {
    if (context.getType() !== 'http' || this.isSkipped(context)) {
      return next.handle();
    }

    const http = context.switchToHttp();
    const apiKey = extractApiKey(
      http.getRequest<{ headers: IncomingHttpHeaders }>().headers,
      this.headerName,
    );
    if (!apiKey) {
      throw new UnauthorizedException('Missing API key');
    }

    if (!(await this.isValidKey(apiKey))) {
      this.logger.warn(`Rejected invalid API key ${maskKey(apiKey)}`);
      throw new UnauthorizedException('Invalid API key');
    }

    if (!this.bucketStore.allow(apiKey)) {
      const retryAfterSeconds = Math.max(
        1,
        Math.ceil(this.bucketStore.getWaitTimeMs(apiKey) / 1000),
      );
      http
        .getResponse<Response>()
        .setHeader('Retry-After', String(retryAfterSeconds));
      this.logger.warn(
        `Rate limit exceeded for key ${maskKey(apiKey)}, retry in ${retryAfterSeconds}s`,
      );
      throw new RateLimitExceededException(retryAfterSeconds);
    }

    return next.handle();
  }

  private isSkipped(context: ExecutionContext): boolean {
    return (
      Reflect.getMetadata(SKIP_ADMISSION_KEY, context.getHandler()) === true ||
      Reflect.getMetadata(SKIP_ADMISSION_KEY, context.getClass()) === true
    );
  }

  /**
   * A failing lookup rejects the request rather than admitting an unchecked key
   */
  private async isValidKey(apiKey: string): Promise<boolean> {
    try {
      return await this.credentialStore.isValid(apiKey);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Credential lookup failed: ${message}`);
      throw new ServiceUnavailableException('Credential lookup unavailable');
    }
  }
}
