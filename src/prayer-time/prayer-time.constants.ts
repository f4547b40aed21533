/**
 * Injection token for the prayer time source.
 *
 * @example
 * constructor(@Inject(PRAYER_TIME_SOURCE) private readonly source: IPrayerTimeSource) {}
 */
export const PRAYER_TIME_SOURCE = Symbol('PRAYER_TIME_SOURCE');

export const ALADHAN_BASE_URL = 'https://api.aladhan.com/v1';

export const USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko)';
