import { Injectable, Logger } from '@nestjs/common';

import { IPlatformActions } from '../interfaces';

/**
 * Captured platform call for test assertions.
 */
export interface CapturedAction {
  action: 'wake' | 'setVolume' | 'openUrl';
  argument?: string | number;
  timestamp: number;
}

/**
 * Fake platform actions for testing and dry runs.
 * Captures every call instead of touching the OS.
 */
@Injectable()
export class FakePlatformActions implements IPlatformActions {
  private readonly logger = new Logger(FakePlatformActions.name);

  /** Captured calls for test assertions */
  public actions: CapturedAction[] = [];

  /** Actions that should reject, with the error to reject with */
  private failures = new Map<CapturedAction['action'], Error>();

  async wake(): Promise<void> {
    this.capture('wake');
  }

  async setVolume(percent: number): Promise<void> {
    this.capture('setVolume', percent);
  }

  async openUrl(url: string): Promise<void> {
    this.capture('openUrl', url);
  }

  // ── Test helpers ──────────────────────────────────────

  private capture(action: CapturedAction['action'], argument?: string | number): void {
    this.actions.push({ action, argument, timestamp: Date.now() });
    this.logger.debug(`[FAKE] ${action}${argument !== undefined ? ` ${argument}` : ''}`);

    const failure = this.failures.get(action);
    if (failure) {
      throw failure;
    }
  }

  /** Make an action reject from now on */
  failOn(action: CapturedAction['action'], error: Error = new Error(`${action} failed`)): void {
    this.failures.set(action, error);
  }

  /** URLs handed to the browser, in order */
  getOpenedUrls(): string[] {
    return this.actions
      .filter((a) => a.action === 'openUrl')
      .map((a) => String(a.argument));
  }

  /** Clear captured calls and failures */
  reset(): void {
    this.actions = [];
    this.failures.clear();
  }
}
