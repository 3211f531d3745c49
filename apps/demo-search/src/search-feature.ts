/**
 * City search with a forecast panel.
 *
 * Typing updates the query at once. The lookup behind it is debounced, so
 * only the last keystroke in a burst reaches the ForecastService. Picking a
 * city loads its forecast into the panel and clears the search.
 */

import { Data, Duration, Effect } from "effect";
import {
  CasePath,
  debounce,
  interact,
  mergeMany,
  whenField,
  whenVariant,
} from "@weft/core";
import type { Handler } from "@weft/core";
import { ForecastService } from "./forecast-service.js";
import type { City, Forecast } from "./forecast-service.js";

export const SEARCH_DEBOUNCE = Duration.millis(300);

// ============================================================================
// State
// ============================================================================

export interface SearchState {
  readonly query: string;
  readonly results: ReadonlyArray<City>;
  readonly loading: boolean;
  readonly lookups: number;
}

export type Units = "celsius" | "fahrenheit";

export type Panel = Data.TaggedEnum<{
  Empty: {};
  Loading: { readonly city: string };
  Loaded: { readonly forecast: Forecast; readonly units: Units };
  Failed: { readonly city: string; readonly message: string };
}>;
export const Panel = Data.taggedEnum<Panel>();

export interface AppState {
  readonly search: SearchState;
  readonly panel: Panel;
}

export const initialApp: AppState = {
  search: { query: "", results: [], loading: false, lookups: 0 },
  panel: Panel.Empty(),
};

// ============================================================================
// Actions
// ============================================================================

export type SearchAction = Data.TaggedEnum<{
  QueryChanged: { readonly query: string };
  Cleared: {};
}>;
export const SearchAction = Data.taggedEnum<SearchAction>();

export type PanelAction = Data.TaggedEnum<{
  ToggleUnits: {};
}>;
export const PanelAction = Data.taggedEnum<PanelAction>();

export type AppAction = Data.TaggedEnum<{
  Search: { readonly action: SearchAction };
  Panel: { readonly action: PanelAction };
  Select: { readonly city: string };
}>;
export const AppAction = Data.taggedEnum<AppAction>();

// ============================================================================
// Search
// ============================================================================

const lookup = interact<SearchState, SearchAction, ForecastService>(
  (draft, action, { none, perform }) => {
    switch (action._tag) {
      case "Cleared":
        draft.current = { ...draft.current, query: "", results: [], loading: false };
        return none;

      case "QueryChanged": {
        const query = action.query.trim();
        if (query.length === 0) {
          draft.current = { ...draft.current, query: action.query, results: [], loading: false };
          return none;
        }

        draft.current = { ...draft.current, query: action.query, loading: true };
        return perform((state, send) =>
          Effect.gen(function* () {
            const service = yield* ForecastService;
            const results = yield* service.searchCities(query);

            // The query moved on while the lookup ran
            const latest = yield* state.get("query");
            if (latest.trim() !== query) return;

            yield* send.update((s) => ({
              ...s,
              results,
              loading: false,
              lookups: s.lookups + 1,
            }));
          })
        );
      }
    }
  }
);

export const searchFeature = debounce(SEARCH_DEBOUNCE, lookup);

// ============================================================================
// Panel
// ============================================================================

type Loaded = Data.TaggedEnum.Value<Panel, "Loaded">;
type ToggleUnits = Data.TaggedEnum.Value<PanelAction, "ToggleUnits">;

const toggleUnits = interact<Loaded, ToggleUnits>((draft, _action, { none }) => {
  draft.current = {
    ...draft.current,
    units: draft.current.units === "celsius" ? "fahrenheit" : "celsius",
  };
  return none;
});

export const panelFeature = whenVariant(
  CasePath.tag<Panel>()("Loaded"),
  CasePath.tag<PanelAction>()("ToggleUnits"),
  toggleUnits
);

export const toFahrenheit = (celsius: number) => Math.round((celsius * 9) / 5 + 32);

export const temperatureLabel = (panel: Loaded) =>
  panel.units === "celsius"
    ? `${panel.forecast.celsius}°C`
    : `${toFahrenheit(panel.forecast.celsius)}°F`;

// ============================================================================
// App
// ============================================================================

const toSearch = CasePath.tagged<AppAction>()("Search", "action", (action) =>
  AppAction.Search({ action })
);
const toPanel = CasePath.tagged<AppAction>()("Panel", "action", (action) =>
  AppAction.Panel({ action })
);

const selection = interact<AppState, AppAction, ForecastService>(
  (draft, action, { none, action: emit, perform, merge }) => {
    if (action._tag !== "Select") return none;

    const city = action.city;
    draft.current = { ...draft.current, panel: Panel.Loading({ city }) };

    return merge(
      emit(AppAction.Search({ action: SearchAction.Cleared() })),
      perform((_state, send) =>
        Effect.gen(function* () {
          const service = yield* ForecastService;
          const panel = yield* service.getForecast(city).pipe(
            Effect.map((forecast): Panel => Panel.Loaded({ forecast, units: "celsius" })),
            Effect.catchTag("CityNotFoundError", (error) =>
              Effect.succeed<Panel>(Panel.Failed({ city, message: error.message }))
            )
          );
          yield* send.update((s) => ({ ...s, panel }));
        })
      )
    );
  }
);

export const app: Handler<AppState, AppAction, ForecastService> = mergeMany<
  AppState,
  AppAction,
  ForecastService
>([
  whenField<AppState>()("search", toSearch, searchFeature),
  whenField<AppState>()("panel", toPanel, panelFeature),
  selection,
]);
