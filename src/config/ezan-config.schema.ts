import { z } from 'zod';

/**
 * Marker the default config file uses for URLs the user still has to fill in.
 */
export const PLACEHOLDER_MARKER = 'YOUR_';

export const PRAYER_SOURCES = ['aladhan', 'local'] as const;
export type PrayerSource = (typeof PRAYER_SOURCES)[number];

export const PLAYER_MODES = ['home', 'office'] as const;
export type PlayerMode = (typeof PLAYER_MODES)[number];

const videoUrl = z.string().url();

/**
 * One video URL per prayer. All five keys are required.
 */
export const prayerVideosSchema = z.object({
  fajr: videoUrl,
  dhuhr: videoUrl,
  asr: videoUrl,
  maghrib: videoUrl,
  isha: videoUrl,
});

export type PrayerVideos = z.infer<typeof prayerVideosSchema>;

export const prayerLocationSchema = z.object({
  city: z.string().min(1),
  country: z.string().min(1),

  /** Only used by the local calculation source */
  latitude: z.number().min(-90).max(90).optional(),
  longitude: z.number().min(-180).max(180).optional(),
});

export type PrayerLocation = z.infer<typeof prayerLocationSchema>;

export const sourceSchema = z.object({
  provider: z.enum(PRAYER_SOURCES).default('aladhan'),

  /** Aladhan calculation method id (13 = Diyanet İşleri Başkanlığı) */
  method: z.number().int().min(0).default(13),

  /** Named method for the local adhan calculation */
  calcMethod: z.string().default('turkey'),

  timeoutSeconds: z.number().int().positive().max(60).default(10),
});

/**
 * Schema for the ezan config file (ezan.config.json).
 */
export const ezanConfigSchema = z
  .object({
    videos: prayerVideosSchema,
    location: prayerLocationSchema,
    source: sourceSchema.default({}),

    /** Output volume applied before each video, in percent */
    volume: z.number().int().min(0).max(100).default(65),

    /** Kept at or below a minute so no minute-resolution prayer time is stepped over */
    pollIntervalSeconds: z.number().int().min(5).max(60).default(30),

    /** Pause between waking the display and opening the video */
    wakeDelaySeconds: z.number().min(0).max(30).default(2),

    /** "office" keeps the schedule running but skips every video */
    mode: z.enum(PLAYER_MODES).default('home'),

    service: z
      .object({
        /** launchd label on macOS */
        label: z.string().default('com.ezanplayer'),
        /** systemd --user unit on Linux */
        unit: z.string().default('ezan-player'),
      })
      .default({}),
  })
  .superRefine((config, ctx) => {
    if (config.source.provider !== 'local') return;

    for (const key of ['latitude', 'longitude'] as const) {
      if (config.location[key] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['location', key],
          message: `Required when source.provider is "local"`,
        });
      }
    }
  });

export type EzanConfig = z.infer<typeof ezanConfigSchema>;

/**
 * Validate a parsed config file.
 * Throws a descriptive error listing every problem if validation fails.
 */
export function validateEzanConfig(data: unknown, source = 'config'): EzanConfig {
  const result = ezanConfigSchema.safeParse(data);

  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new Error(`Invalid ${source}:\n${errors}`);
  }

  return result.data;
}

/**
 * Config written on first start. URLs are placeholders until the user edits them.
 */
export function createDefaultEzanConfig(): z.input<typeof ezanConfigSchema> {
  return {
    videos: {
      fajr: `https://youtube.com/watch?v=${PLACEHOLDER_MARKER}FAJR_VIDEO_ID`,
      dhuhr: `https://youtube.com/watch?v=${PLACEHOLDER_MARKER}DHUHR_VIDEO_ID`,
      asr: `https://youtube.com/watch?v=${PLACEHOLDER_MARKER}ASR_VIDEO_ID`,
      maghrib: `https://youtube.com/watch?v=${PLACEHOLDER_MARKER}MAGHRIB_VIDEO_ID`,
      isha: `https://youtube.com/watch?v=${PLACEHOLDER_MARKER}ISHA_VIDEO_ID`,
    },
    location: {
      city: 'Barcelona',
      country: 'Spain',
      latitude: 41.3874,
      longitude: 2.1686,
    },
    source: {
      provider: 'aladhan',
      method: 13,
      calcMethod: 'turkey',
      timeoutSeconds: 10,
    },
    volume: 65,
    pollIntervalSeconds: 30,
    wakeDelaySeconds: 2,
    mode: 'home',
  };
}

export function isPlaceholderUrl(url: string): boolean {
  return url.includes(PLACEHOLDER_MARKER);
}
