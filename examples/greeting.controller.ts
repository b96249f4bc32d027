import { Get } from '@nestjs/common';
import { AdmissionGated, SkipAdmission } from '../src';

/**
 * Two routes sharing one rate limit per API key
 */
@AdmissionGated()
export class GreetingController {
  @Get('hello')
  hello(): string {
    return 'Hello World';
  }

  @Get('world')
  world(): string {
    return 'Welcome to the World';
  }

  @SkipAdmission()
  @Get('health')
  health(): { ok: boolean } {
    return { ok: true };
  }
}
