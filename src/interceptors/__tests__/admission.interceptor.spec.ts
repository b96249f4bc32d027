import { Test, TestingModule } from '@nestjs/testing';
import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
} from '@nestjs/common';
import { lastValueFrom, of } from 'rxjs';
import { AdmissionInterceptor, extractApiKey } from '../admission.interceptor';
import { TokenBucketStore } from '../../services/token-bucket-store.service';
import { StaticCredentialStore } from '../../adapters/static-credential-store.adapter';
import { SkipAdmission } from '../../decorators/skip-admission.decorator';
import { RateLimitExceededException } from '../../exceptions/rate-limit-exceeded.exception';
import { ICredentialStore } from '../../interfaces/credential-store.interface';
import { KeyAdmissionConfig } from '../../interfaces/config.interface';
import {
  KEY_ADMISSION_CONFIG,
  KEY_ADMISSION_CREDENTIAL_STORE,
} from '../../utils/constants';

const T0 = new Date('2026-01-01T00:00:00.000Z').getTime();

class TestController {
  @SkipAdmission()
  health() {
    return 'ok';
  }

  greet() {
    return 'Hello World';
  }
}

@SkipAdmission()
class OpenController {
  greet() {
    return 'Hello World';
  }
}

async function rejectionOf(promise: Promise<unknown>): Promise<HttpException> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(error instanceof HttpException)) {
    throw new Error(`Expected an HttpException, got ${String(error)}`);
  }
  return error;
}

describe('AdmissionInterceptor', () => {
  let interceptor: AdmissionInterceptor;
  let bucketStore: TokenBucketStore;
  let credentialStore: ICredentialStore;
  let response: { setHeader: jest.Mock };
  let callHandler: CallHandler;

  const createInterceptor = async (config: Partial<KeyAdmissionConfig> = {}) => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        AdmissionInterceptor,
        TokenBucketStore,
        {
          provide: KEY_ADMISSION_CONFIG,
          useValue: {
            capacity: 5,
            windowSeconds: 60,
            credentialStore: 'custom',
            ...config,
          },
        },
        { provide: KEY_ADMISSION_CREDENTIAL_STORE, useValue: credentialStore },
      ],
    }).compile();

    interceptor = module.get<AdmissionInterceptor>(AdmissionInterceptor);
    bucketStore = module.get<TokenBucketStore>(TokenBucketStore);
  };

  const createContext = (
    headers: Record<string, string | string[]>,
    handler: () => unknown = TestController.prototype.greet,
    controller: object = TestController,
    type = 'http',
  ) =>
    ({
      getType: jest.fn().mockReturnValue(type),
      switchToHttp: jest.fn().mockReturnValue({
        getRequest: jest.fn().mockReturnValue({ headers }),
        getResponse: jest.fn().mockReturnValue(response),
      }),
      getHandler: jest.fn().mockReturnValue(handler),
      getClass: jest.fn().mockReturnValue(controller),
    }) as unknown as ExecutionContext;

  const admit = async (context: ExecutionContext) =>
    lastValueFrom(await interceptor.intercept(context, callHandler));

  beforeEach(async () => {
    credentialStore = new StaticCredentialStore(['test-key', 'other-key']);
    response = { setHeader: jest.fn() };
    callHandler = {
      handle: jest.fn().mockReturnValue(of('Hello World')),
    };

    await createInterceptor();
  });

  afterEach(() => {
    jest.useRealTimers();
    jest.clearAllMocks();
  });

  describe('intercept', () => {
    it('should reject a request without an API key with 401', async () => {
      const error = await rejectionOf(admit(createContext({})));

      expect(error.getStatus()).toBe(HttpStatus.UNAUTHORIZED);
      expect(error.message).toBe('Missing API key');
      expect(callHandler.handle).not.toHaveBeenCalled();
    });

    it('should treat an empty API key as missing', async () => {
      const error = await rejectionOf(admit(createContext({ 'x-api-key': '' })));

      expect(error.getStatus()).toBe(HttpStatus.UNAUTHORIZED);
      expect(error.message).toBe('Missing API key');
    });

    it('should reject an unknown API key with 401 without creating a bucket', async () => {
      const error = await rejectionOf(
        admit(createContext({ 'x-api-key': 'unknown' })),
      );

      expect(error.getStatus()).toBe(HttpStatus.UNAUTHORIZED);
      expect(error.message).toBe('Invalid API key');
      expect(bucketStore.peek('unknown')).toBeNull();
      expect(callHandler.handle).not.toHaveBeenCalled();
    });

    it('should forward an admitted request to the handler', async () => {
      const result = await admit(createContext({ 'x-api-key': 'test-key' }));

      expect(result).toBe('Hello World');
      expect(callHandler.handle).toHaveBeenCalledTimes(1);
      expect(bucketStore.peek('test-key')?.tokenCount).toBe(4);
    });

    it('should reject with 429 and Retry-After once the bucket is empty', async () => {
      jest.useFakeTimers({ now: T0 });
      for (let i = 0; i < 5; i++) {
        await admit(createContext({ 'x-api-key': 'test-key' }));
      }

      const error = await rejectionOf(
        admit(createContext({ 'x-api-key': 'test-key' })),
      );

      expect(error).toBeInstanceOf(RateLimitExceededException);
      expect(error.getStatus()).toBe(HttpStatus.TOO_MANY_REQUESTS);
      expect(error.message).toBe('Rate limit exceeded');
      expect(response.setHeader).toHaveBeenCalledWith('Retry-After', '12');
      expect(error.getResponse()).toEqual({
        statusCode: 429,
        message: 'Rate limit exceeded',
        retryAfter: 12,
      });
      expect(callHandler.handle).toHaveBeenCalledTimes(5);
    });

    it('should shorten Retry-After as the next token approaches', async () => {
      jest.useFakeTimers({ now: T0 });
      for (let i = 0; i < 5; i++) {
        await admit(createContext({ 'x-api-key': 'test-key' }));
      }
      jest.setSystemTime(T0 + 10_500);

      await rejectionOf(admit(createContext({ 'x-api-key': 'test-key' })));

      expect(response.setHeader).toHaveBeenCalledWith('Retry-After', '2');
    });

    it('should bill each key separately', async () => {
      for (let i = 0; i < 5; i++) {
        await admit(createContext({ 'x-api-key': 'test-key' }));
      }

      await expect(
        admit(createContext({ 'x-api-key': 'other-key' })),
      ).resolves.toBe('Hello World');
    });

    it('should bill the first key when the header is sent twice', async () => {
      // Node delivers repeated custom headers joined with ", "
      await expect(
        admit(createContext({ 'x-api-key': 'other-key, test-key' })),
      ).resolves.toBe('Hello World');

      expect(bucketStore.peek('other-key')?.tokenCount).toBe(4);
      expect(bucketStore.peek('test-key')).toBeNull();
    });

    it('should honour a custom header name', async () => {
      await createInterceptor({ headerName: 'X-Client-Token' });

      await expect(
        admit(createContext({ 'x-client-token': 'test-key' })),
      ).resolves.toBe('Hello World');
      const error = await rejectionOf(
        admit(createContext({ 'x-api-key': 'test-key' })),
      );
      expect(error.message).toBe('Missing API key');
    });

    it('should fail closed with 503 when the credential lookup throws', async () => {
      credentialStore = {
        initialize: jest.fn(),
        isValid: jest.fn().mockRejectedValue(new Error('connection refused')),
      };
      await createInterceptor();

      const error = await rejectionOf(
        admit(createContext({ 'x-api-key': 'test-key' })),
      );

      expect(error.getStatus()).toBe(HttpStatus.SERVICE_UNAVAILABLE);
      expect(bucketStore.peek('test-key')).toBeNull();
      expect(callHandler.handle).not.toHaveBeenCalled();
    });

    it('should let handlers marked with @SkipAdmission through', async () => {
      await expect(
        admit(createContext({}, TestController.prototype.health)),
      ).resolves.toBe('Hello World');
    });

    it('should let controllers marked with @SkipAdmission through', async () => {
      await expect(
        admit(createContext({}, OpenController.prototype.greet, OpenController)),
      ).resolves.toBe('Hello World');
    });

    it('should ignore non-HTTP contexts', async () => {
      await expect(
        admit(
          createContext({}, TestController.prototype.greet, TestController, 'rpc'),
        ),
      ).resolves.toBe('Hello World');
    });
  });

  describe('concurrent requests', () => {
    it('should admit exactly capacity requests when lookups resolve out of order', async () => {
      let call = 0;
      credentialStore = {
        initialize: jest.fn(),
        isValid: jest.fn(async () => {
          const hops = (call++ * 3) % 7;
          for (let i = 0; i < hops; i++) {
            await Promise.resolve();
          }
          return true;
        }),
      };
      await createInterceptor();

      const outcomes = await Promise.all(
        Array.from({ length: 20 }, () =>
          admit(createContext({ 'x-api-key': 'test-key' })).then(
            () => HttpStatus.OK,
            (error: unknown) =>
              error instanceof HttpException ? error.getStatus() : -1,
          ),
        ),
      );

      expect(outcomes.filter((s) => s === HttpStatus.OK)).toHaveLength(5);
      expect(
        outcomes.filter((s) => s === HttpStatus.TOO_MANY_REQUESTS),
      ).toHaveLength(15);
      expect(bucketStore.peek('test-key')?.tokenCount).toBe(0);
    });
  });
});

describe('extractApiKey', () => {
  it('should match the header name case-insensitively', () => {
    expect(extractApiKey({ 'x-api-key': 'test-key' }, 'X-API-KEY')).toBe(
      'test-key',
    );
  });

  it('should take the first of comma-joined repeated values', () => {
    expect(
      extractApiKey({ 'x-api-key': 'test-key, other-key' }, 'X-API-KEY'),
    ).toBe('test-key');
  });

  it('should treat a leading empty value as missing', () => {
    expect(extractApiKey({ 'x-api-key': ' , test-key' }, 'X-API-KEY')).toBeNull();
  });

  it('should return null when the header is absent', () => {
    expect(extractApiKey({ host: 'localhost' }, 'X-API-KEY')).toBeNull();
  });
});
