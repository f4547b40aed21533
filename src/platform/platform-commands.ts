/**
 * An argv: program followed by its arguments.
 */
export type CommandLine = readonly [string, ...string[]];

/**
 * OS commands for one platform. A null entry means the platform has no
 * equivalent and the action is skipped.
 */
export interface PlatformCommands {
  platform: string;
  wake: CommandLine | null;
  setVolume: ((percent: number) => CommandLine) | null;
  openUrl: (url: string) => CommandLine;
}

const DARWIN: PlatformCommands = {
  platform: 'darwin',
  // Asserts user activity for 10 seconds, which turns the display on
  wake: ['caffeinate', '-u', '-t', '10'],
  setVolume: (percent) => ['osascript', '-e', `set volume output volume ${percent}`],
  openUrl: (url) => ['open', url],
};

const LINUX: PlatformCommands = {
  platform: 'linux',
  wake: ['xset', 'dpms', 'force', 'on'],
  setVolume: (percent) => ['pactl', 'set-sink-volume', '@DEFAULT_SINK@', `${percent}%`],
  openUrl: (url) => ['xdg-open', url],
};

const WIN32: PlatformCommands = {
  platform: 'win32',
  wake: null,
  setVolume: null,
  // Hands the URL to the registered protocol handler without going through cmd.exe
  openUrl: (url) => ['rundll32', 'url.dll,FileProtocolHandler', url],
};

/**
 * Pick the command table for a Node platform name. Other Unix-likes use the
 * Linux (freedesktop) commands.
 */
export function platformCommandsFor(platform: NodeJS.Platform): PlatformCommands {
  switch (platform) {
    case 'darwin':
      return DARWIN;
    case 'win32':
      return WIN32;
    default:
      return LINUX;
  }
}
