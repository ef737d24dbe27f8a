import { SetMetadata } from '@nestjs/common';

export const SKIP_ADMISSION_KEY = 'skip-admission';

/**
 * Exempts a controller or handler from admission control. Meant for the
 * gateway's own admin, metrics and health routes.
 *
 * @example
 * @SkipAdmission()
 * @Get('health')
 * check() {}
 */
export const SkipAdmission = () => SetMetadata(SKIP_ADMISSION_KEY, true);
