import { Config, Data, Duration, Effect } from "effect";

// ============================================================================
// Types
// ============================================================================

export interface City {
  readonly name: string;
  readonly country: string;
}

export interface Forecast {
  readonly city: string;
  readonly celsius: number;
  readonly description: string;
}

interface CityRecord extends City {
  readonly celsius: number;
  readonly code: number;
}

// ============================================================================
// Errors
// ============================================================================

export class CityNotFoundError extends Data.TaggedError("CityNotFoundError")<{
  readonly message: string;
  readonly city: string;
}> {}

// ============================================================================
// Catalog
// ============================================================================

const conditions: Record<number, string> = {
  0: "Clear sky",
  1: "Mainly clear",
  2: "Partly cloudy",
  3: "Overcast",
  45: "Foggy",
  61: "Light rain",
  63: "Rain",
  71: "Light snow",
  95: "Thunderstorm",
};

const describe = (code: number) => conditions[code] ?? "Unknown";

const catalog: ReadonlyArray<CityRecord> = [
  { name: "Amsterdam", country: "NL", celsius: 11, code: 3 },
  { name: "Athens", country: "GR", celsius: 24, code: 0 },
  { name: "Auckland", country: "NZ", celsius: 16, code: 61 },
  { name: "Bergen", country: "NO", celsius: 7, code: 63 },
  { name: "Berlin", country: "DE", celsius: 13, code: 2 },
  { name: "Bern", country: "CH", celsius: 9, code: 45 },
  { name: "Boston", country: "US", celsius: 15, code: 1 },
  { name: "Lima", country: "PE", celsius: 19, code: 3 },
  { name: "Lisbon", country: "PT", celsius: 21, code: 0 },
  { name: "Osaka", country: "JP", celsius: 22, code: 95 },
  { name: "Oslo", country: "NO", celsius: 4, code: 71 },
];

// ============================================================================
// Service
// ============================================================================

/**
 * In-memory city lookup with a configurable response delay
 * (`FORECAST_LATENCY`, default 150 millis).
 */
export class ForecastService extends Effect.Service<ForecastService>()("ForecastService", {
  effect: Effect.gen(function* () {
    const latency = yield* Config.duration("FORECAST_LATENCY").pipe(
      Config.withDefault(Duration.millis(150))
    );
    yield* Effect.log("Created ForecastService");

    const searchCities = (query: string): Effect.Effect<ReadonlyArray<City>> =>
      Effect.gen(function* () {
        yield* Effect.sleep(latency);
        const prefix = query.trim().toLowerCase();
        const matches = catalog
          .filter((city) => city.name.toLowerCase().startsWith(prefix))
          .map(({ name, country }) => ({ name, country }));
        yield* Effect.logDebug(`${matches.length} cities match "${prefix}"`);
        return matches;
      });

    const getForecast = (city: string): Effect.Effect<Forecast, CityNotFoundError> =>
      Effect.gen(function* () {
        yield* Effect.sleep(latency);
        const record = catalog.find((c) => c.name.toLowerCase() === city.toLowerCase());

        if (!record) {
          return yield* Effect.fail(
            new CityNotFoundError({ message: `No forecast for ${city}`, city })
          );
        }

        return {
          city: record.name,
          celsius: record.celsius,
          description: describe(record.code),
        };
      });

    return { searchCities, getForecast };
  }),
}) {}
