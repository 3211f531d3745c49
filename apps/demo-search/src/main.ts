import { Effect, Logger, LogLevel, Stream } from "effect";
import { Coordinator } from "@weft/core";
import { ForecastService } from "./forecast-service.js";
import {
  AppAction,
  PanelAction,
  SearchAction,
  app,
  initialApp,
  temperatureLabel,
} from "./search-feature.js";
import type { AppState } from "./search-feature.js";

const render = (state: AppState): string => {
  const { search, panel } = state;
  const results = search.results.map((c) => `${c.name} (${c.country})`).join(", ");
  const line = `query="${search.query}"${search.loading ? " …" : ""} results=[${results}]`;

  switch (panel._tag) {
    case "Empty":
      return line;
    case "Loading":
      return `${line} | loading ${panel.city}`;
    case "Loaded":
      return `${line} | ${panel.forecast.city}: ${temperatureLabel(panel)}, ${panel.forecast.description}`;
    case "Failed":
      return `${line} | ${panel.message}`;
  }
};

const typeQuery = (coordinator: Coordinator<AppState, AppAction>, text: string) =>
  Effect.gen(function* () {
    let last = coordinator.dispatch(AppAction.Search({ action: SearchAction.Cleared() }));
    for (let i = 1; i <= text.length; i++) {
      last = coordinator.dispatch(
        AppAction.Search({ action: SearchAction.QueryChanged({ query: text.slice(0, i) }) })
      );
      yield* Effect.sleep("80 millis");
    }
    // Only the final keystroke's lookup survives the debounce
    yield* last.finish;
  });

const program = Effect.gen(function* () {
  const coordinator = yield* Coordinator.makeFromConfig(initialApp, app, { label: "demo-search" });

  coordinator.onError((error) => {
    console.error(`[${error._tag}] ${error.message}`);
  });

  yield* Stream.runForEach(coordinator.changes, (state) => Effect.log(render(state))).pipe(
    Effect.forkScoped
  );
  yield* Effect.yieldNow();

  yield* typeQuery(coordinator, "ber");
  const [first] = coordinator.getState().search.results;
  if (!first) {
    return yield* Effect.logWarning("no cities matched");
  }

  yield* coordinator.dispatch(AppAction.Select({ city: first.name })).finish;
  yield* coordinator.dispatch(AppAction.Panel({ action: PanelAction.ToggleUnits() })).finish;

  yield* coordinator.dispatch(AppAction.Select({ city: "Atlantis" })).finish;
  yield* Effect.log(`final: ${render(coordinator.getState())}`);
});

Effect.runFork(
  program.pipe(
    Effect.scoped,
    Effect.provide(ForecastService.Default),
    Effect.provide(Logger.pretty),
    Logger.withMinimumLogLevel(LogLevel.Debug)
  )
);
