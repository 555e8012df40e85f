import { Args, Command, Options, Prompt } from "@effect/cli";
import { FetchHttpClient, Terminal } from "@effect/platform";
import { NodeContext, NodeRuntime } from "@effect/platform-node";
import process from "node:process";
import {
  Config,
  Console,
  Effect,
  Layer,
  Logger,
  LogLevel,
  Option,
} from "effect";
import { detailChart, renderChart } from "./src/chart.ts";
import {
  chartWidth,
  CHART_HEIGHT,
  CLEAR,
  detailLines,
  runDashboard,
} from "./src/dashboard.ts";
import { fetchQuote } from "./src/fetch-batch.ts";
import { BOLD, type CliError, formatError, formatStatus, RESET } from "./src/format.ts";
import { MarketDataTestLive } from "./src/providers/market-data-mock.ts";
import { YahooFinanceLive } from "./src/providers/yahoo-finance.ts";
import {
  RefreshCoordinator,
  RefreshCoordinatorLive,
} from "./src/refresh-coordinator.ts";
import { TIME_RANGE_LABELS } from "./src/settings.ts";
import { loadBanner, renderProgress, runSplash } from "./src/startup.ts";
import { SettingsStore, StorageLive, SymbolStore } from "./src/storage.ts";
import { normalizeSymbol } from "./src/symbols.ts";
import { buildRows, renderTable } from "./src/table.ts";

// --- watch ---

const noSplash = Options.boolean("no-splash").pipe(
  Options.withDescription("Skip the startup splash and show the dashboard at once"),
);

const watch = Command.make("watch", { noSplash }, ({ noSplash }) =>
  Effect.gen(function* () {
    const terminal = yield* Terminal.Terminal;
    const coordinator = yield* RefreshCoordinator;

    if (noSplash) {
      yield* coordinator.fetchNow("startup");
    } else {
      const banner = yield* loadBanner;
      const firstFetch = coordinator.fetchNow("startup").pipe(
        Effect.flatMap((ticket) => (ticket === undefined ? Effect.void : ticket.settled)),
      );
      yield* runSplash(firstFetch, (step) =>
        terminal.display(`${CLEAR}${banner}\n\n${renderProgress(step)}\n`).pipe(
          Effect.catchAll((e) => Effect.logWarning(`[startup] ${e.message}`)),
        ),
      );
    }

    yield* coordinator.startAutoRefresh;
    yield* runDashboard;
  }).pipe(
    Effect.ensuring(Effect.flatMap(RefreshCoordinator, (c) => c.shutdown)),
    Effect.provide(RefreshCoordinatorLive),
  ),
).pipe(Command.withDescription("Interactive dashboard with auto-refresh"));

// --- snapshot ---

const snapshot = Command.make("snapshot", {}, () =>
  Effect.gen(function* () {
    const coordinator = yield* RefreshCoordinator;
    const ticket = yield* coordinator.fetchNow("manual");
    if (ticket !== undefined) yield* ticket.settled;
    const state = yield* coordinator.current;
    yield* Console.log(renderTable(buildRows(state), state.sort).join("\n"));
    yield* Console.log(formatStatus(state.status, state.settings.timezone));
  }).pipe(Effect.provide(RefreshCoordinatorLive)),
).pipe(Command.withDescription("Fetch every tracked symbol once and print the table"));

// --- quote ---

const symbol = Options.text("symbol").pipe(
  Options.withDescription("Ticker symbol (e.g. BHP, CBA.AX)"),
  Options.withFallbackPrompt(
    Prompt.text({
      message: "Enter a ticker symbol:",
      validate: (value) =>
        value.trim().length === 0
          ? Effect.fail("Symbol cannot be empty")
          : Effect.succeed(value.trim()),
    }),
  ),
);

const range = Options.choice("range", TIME_RANGE_LABELS).pipe(
  Options.withDescription("Chart range (defaults to the saved setting)"),
  Options.optional,
);

const quote = Command.make("quote", { symbol, range }, ({ symbol, range }) =>
  Effect.gen(function* () {
    const ticker = yield* normalizeSymbol(symbol);
    const settings = yield* Effect.flatMap(SettingsStore, (store) => store.load);
    const timeRange = Option.getOrElse(range, () => settings.timeRange);
    const loaded = yield* fetchQuote(ticker, timeRange);
    const chart = detailChart(loaded, ticker, settings.timezone);
    yield* Console.log(
      [
        "",
        `${BOLD}${ticker}${RESET}`,
        ...detailLines(loaded),
        ...renderChart(chart, chartWidth(80), CHART_HEIGHT),
      ].join("\n"),
    );
  }),
).pipe(Command.withDescription("Fetch one symbol and print its detail view"));

// --- symbols ---

const tickerArg = Args.text({ name: "symbol" });

const symbolsList = Command.make("list", {}, () =>
  Effect.gen(function* () {
    const symbols = yield* Effect.flatMap(SymbolStore, (store) => store.load);
    yield* Console.log(symbols.length === 0 ? "No stocks to monitor." : symbols.join("\n"));
  }),
);

const symbolsAdd = Command.make("add", { symbol: tickerArg }, ({ symbol }) =>
  Effect.gen(function* () {
    const store = yield* SymbolStore;
    const ticker = yield* normalizeSymbol(symbol);
    const symbols = yield* store.load;
    if (symbols.includes(ticker)) {
      yield* Console.log(`${ticker} is already being monitored.`);
      return;
    }
    yield* store.save([...symbols, ticker]);
    yield* Console.log(`Added ${ticker}.`);
  }),
);

const symbolsRemove = Command.make("remove", { symbol: tickerArg }, ({ symbol }) =>
  Effect.gen(function* () {
    const store = yield* SymbolStore;
    const ticker = yield* normalizeSymbol(symbol);
    const symbols = yield* store.load;
    if (!symbols.includes(ticker)) {
      yield* Console.log(`${ticker} is not being monitored.`);
      return;
    }
    yield* store.save(symbols.filter((s) => s !== ticker));
    yield* Console.log(`Removed ${ticker} successfully.`);
  }),
);

const symbols = Command.make("symbols").pipe(
  Command.withDescription("Manage the tracked symbol list"),
  Command.withSubcommands([symbolsList, symbolsAdd, symbolsRemove]),
);

const command = Command.make("share-monitor").pipe(
  Command.withSubcommands([watch, snapshot, quote, symbols]),
);

// --- Layers ---
// Set STOCK_PROVIDER to "yahoo" (default) or "test".

const MarketDataLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("STOCK_PROVIDER").pipe(
      Config.withDefault("yahoo"),
    );
    return provider === "test" ? MarketDataTestLive : YahooFinanceLive;
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

// LOG_LEVEL defaults to Warning so debug output stays off the dashboard.
const LoggingLive = Layer.unwrapEffect(
  Config.logLevel("LOG_LEVEL").pipe(
    Config.withDefault(LogLevel.Warning),
    Effect.map(Logger.minimumLogLevel),
  ),
);

// --- Run ---

const cli = Command.run(command, {
  name: "share-monitor",
  version: "0.1.0",
});

const logCliError = (e: CliError) => Console.error(formatError(e));

cli(process.argv).pipe(
  Effect.catchTags({
    NetworkError: logCliError,
    HttpError: logCliError,
    ParseError: logCliError,
    SymbolNotFound: logCliError,
    NoPriceData: logCliError,
    InvalidSymbol: logCliError,
    SystemError: logCliError,
    BadArgument: logCliError,
  }),
  Effect.provide(MarketDataLive),
  Effect.provide(StorageLive),
  Effect.provide(LoggingLive),
  Effect.provide(NodeContext.layer),
  NodeRuntime.runMain,
);
