/**
 * Raised by a prayer time source when the times cannot be obtained:
 * network failure, a non-2xx response, or a body that doesn't yield
 * five well-formed, ordered times.
 */
export class PrayerTimeFetchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PrayerTimeFetchError';
  }
}
