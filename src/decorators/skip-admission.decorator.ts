import { SetMetadata } from '@nestjs/common';

/**
 * Metadata key for routes exempt from admission control
 */
export const SKIP_ADMISSION_KEY = 'key_admission:skip';

/**
 * Exempts a route handler, or a whole controller, from the admission gate.
 *
 * @example
 * ```typescript
 * @AdmissionGated('reports')
 * export class ReportsController {
 *   @SkipAdmission()
 *   @Get('health')
 *   health() {
 *     return { ok: true };
 *   }
 * }
 * ```
 */
export const SkipAdmission = () => SetMetadata(SKIP_ADMISSION_KEY, true);
