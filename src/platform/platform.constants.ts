/**
 * Injection token for the platform actions.
 *
 * @example
 * constructor(@Inject(PLATFORM_ACTIONS) private readonly platform: IPlatformActions) {}
 */
export const PLATFORM_ACTIONS = Symbol('PLATFORM_ACTIONS');

/** Injection token for the command runner behind the shell actions */
export const COMMAND_RUNNER = Symbol('COMMAND_RUNNER');

/** Injection token for the platform's command table */
export const PLATFORM_COMMANDS = Symbol('PLATFORM_COMMANDS');

/** Upper bound for any single OS command */
export const COMMAND_TIMEOUT_MS = 15_000;
