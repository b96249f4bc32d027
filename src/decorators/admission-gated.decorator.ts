import { applyDecorators, Controller, UseInterceptors } from '@nestjs/common';
import { AdmissionInterceptor } from '../interceptors/admission.interceptor';

/**
 * Declares a controller whose routes all pass through the admission gate:
 * the API key header is required, must be valid, and is billed one token per request.
 *
 * @param path Route prefix for the controller
 *
 * @example
 * ```typescript
 * @AdmissionGated()
 * export class GreetingController {
 *   @Get('hello')
 *   hello() {
 *     return 'Hello World';
 *   }
 * }
 * ```
 */
export function AdmissionGated(path?: string) {
  return applyDecorators(
    path === undefined ? Controller() : Controller(path),
    UseInterceptors(AdmissionInterceptor),
  );
}
