/**
 * Side effects a trigger needs from the operating system.
 * Implementations reject when the underlying command fails.
 */
export interface IPlatformActions {
  /** Wake the display / keep the machine from sleeping for a moment */
  wake(): Promise<void>;

  /** Set the system output volume, 0-100 */
  setVolume(percent: number): Promise<void>;

  /** Open a URL in the default browser */
  openUrl(url: string): Promise<void>;
}
