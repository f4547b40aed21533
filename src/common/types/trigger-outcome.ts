/**
 * What happened when a prayer's trigger ran.
 * - played: the video URL was handed to the browser
 * - skipped: nothing was opened (office mode, placeholder URL)
 * - failed: opening the URL errored
 */
export const TRIGGER_OUTCOMES = ['played', 'skipped', 'failed'] as const;

export type TriggerOutcome = (typeof TRIGGER_OUTCOMES)[number];
