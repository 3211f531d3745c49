import { Config, Duration, Effect } from "effect";
import type { CoordinatorOptions, ResolvedCoordinatorOptions } from "./types.js";

export const DEFAULT_OPTIONS: ResolvedCoordinatorOptions = {
  registrationWindow: Duration.millis(10),
  debug: true,
  label: "coordinator",
};

export const resolveOptions = (options?: CoordinatorOptions): ResolvedCoordinatorOptions => ({
  registrationWindow:
    options?.registrationWindow === undefined
      ? DEFAULT_OPTIONS.registrationWindow
      : Duration.decode(options.registrationWindow),
  debug: options?.debug ?? DEFAULT_OPTIONS.debug,
  label: options?.label ?? DEFAULT_OPTIONS.label,
});

const registrationWindow = Config.duration("WEFT_REGISTRATION_WINDOW").pipe(
  Config.withDefault(DEFAULT_OPTIONS.registrationWindow)
);

const debug = Config.boolean("WEFT_DEBUG").pipe(Config.withDefault(DEFAULT_OPTIONS.debug));

/**
 * Coordinator settings read from the active `ConfigProvider`
 * (environment variables by default).
 *
 * - `WEFT_REGISTRATION_WINDOW` - e.g. `"25 millis"`, defaults to 10 millis
 * - `WEFT_DEBUG` - `true`/`false`, defaults to `true`
 */
export const CoordinatorConfig = {
  registrationWindow,
  debug,

  /**
   * Load options, letting explicit `overrides` win over configured values.
   */
  load: (overrides?: CoordinatorOptions): Effect.Effect<ResolvedCoordinatorOptions> =>
    Effect.gen(function* () {
      const configured = {
        registrationWindow: yield* registrationWindow,
        debug: yield* debug,
      };
      return resolveOptions({ ...configured, ...overrides });
    }).pipe(Effect.orDie),
};
