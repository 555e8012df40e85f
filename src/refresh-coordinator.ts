// Refresh coordinator — owns the application state and schedules fetches.
//
// Every state transition runs on one owner fiber that drains a mailbox.
// Fetch batches run on a bounded pool of forked fibers and post their
// results back to the same mailbox; only the owner merges them.

import {
  Cause,
  Clock,
  Config,
  Context,
  Deferred,
  Duration,
  Effect,
  Fiber,
  FiberSet,
  Layer,
  Option,
  Queue,
  Ref,
  Scope,
  type Stream,
  SubscriptionRef,
} from "effect";
import * as State from "./app-state.ts";
import type { QuoteSnapshot } from "./domain.ts";
import { runFetchBatch } from "./fetch-batch.ts";
import type { MarketData } from "./market-data.ts";
import type { Settings } from "./settings.ts";
import type { SortColumn } from "./sort.ts";
import { SettingsStore, SymbolStore } from "./storage.ts";

/** Concurrent fetch batches. */
export const POOL_SIZE = 5;

export const DEFAULT_REFRESH_INTERVAL = Duration.seconds(30);

export type FetchReason =
  | "startup"
  | "timer"
  | "manual"
  | "settings"
  | "symbols"
  | "view";

/** How a batch ended: merged, discarded as stale, failed as a whole, or
 *  dropped because the coordinator shut down first. */
export type Settled = State.MergeOutcome | "failed" | "closed";

export interface FetchTicket {
  readonly generation: number;
  readonly settled: Effect.Effect<Settled>;
}

type Message =
  | { readonly _tag: "Run"; readonly run: Effect.Effect<void> }
  | {
      readonly _tag: "BatchCompleted";
      readonly generation: number;
      readonly snapshots: ReadonlyArray<QuoteSnapshot>;
      readonly done: Deferred.Deferred<Settled>;
    }
  | {
      readonly _tag: "BatchFailed";
      readonly generation: number;
      readonly cause: string;
      readonly done: Deferred.Deferred<Settled>;
    };

// --- Service ---

export class RefreshCoordinator extends Context.Tag("RefreshCoordinator")<
  RefreshCoordinator,
  {
    readonly current: Effect.Effect<State.AppState>;
    readonly changes: Stream.Stream<State.AppState>;

    /** Start a batch over every tracked symbol. Undefined when nothing was
     *  started (no symbols, or already shut down). */
    readonly fetchNow: (
      reason: FetchReason,
    ) => Effect.Effect<FetchTicket | undefined>;

    readonly addSymbol: (input: string) => Effect.Effect<FetchTicket | undefined>;
    readonly removeSymbol: (input: string) => Effect.Effect<void>;
    readonly toggleVisibility: (symbol: string) => Effect.Effect<void>;
    readonly sortBy: (column: SortColumn) => Effect.Effect<void>;
    readonly applySettings: (
      settings: Settings,
    ) => Effect.Effect<FetchTicket | undefined>;
    readonly selectView: (
      view: State.View,
    ) => Effect.Effect<FetchTicket | undefined>;
    readonly notify: (
      level: State.NoticeLevel,
      text: string,
    ) => Effect.Effect<void>;

    /** Re-fetch every interval until shutdown. Calling it twice is a no-op. */
    readonly startAutoRefresh: Effect.Effect<void>;
    readonly shutdown: Effect.Effect<void>;
  }
>() {}

export interface CoordinatorOptions {
  readonly refreshInterval: Duration.DurationInput;
}

export const make = (
  options: CoordinatorOptions,
): Effect.Effect<
  Context.Tag.Service<RefreshCoordinator>,
  never,
  MarketData | SymbolStore | SettingsStore | Scope.Scope
> =>
  Effect.gen(function* () {
    const symbolStore = yield* SymbolStore;
    const settingsStore = yield* SettingsStore;
    const context = yield* Effect.context<MarketData>();
    const interval = Duration.decode(options.refreshInterval);

    const state = yield* SubscriptionRef.make(
      State.initialAppState(
        yield* symbolStore.load,
        yield* settingsStore.load,
        Duration.toMillis(interval) / 1000,
      ),
    );
    const mailbox = yield* Queue.unbounded<Message>();
    const pool = yield* Effect.makeSemaphore(POOL_SIZE);
    const batches = yield* FiberSet.make();
    const closed = yield* Ref.make(false);
    const timer = yield* Ref.make(Option.none<Fiber.RuntimeFiber<never>>());

    // --- Owner-side helpers (call only from the owner fiber) ---

    const update = (f: (s: State.AppState) => State.AppState) =>
      SubscriptionRef.update(state, f);

    const persistSymbols = (symbols: ReadonlyArray<string>) =>
      symbolStore.save(symbols).pipe(
        Effect.catchAll((e) =>
          Effect.logWarning(`[coordinator] could not save symbols: ${e.message}`),
        ),
      );

    const persistSettings = (settings: Settings) =>
      settingsStore.save(settings).pipe(
        Effect.catchAll((e) =>
          Effect.logWarning(`[coordinator] could not save settings: ${e.message}`),
        ),
      );

    const startBatch = (
      reason: FetchReason,
    ): Effect.Effect<FetchTicket | undefined> =>
      Effect.gen(function* () {
        const before = yield* SubscriptionRef.get(state);
        if (before.symbols.length === 0) {
          yield* SubscriptionRef.set(state, State.noSymbols(before));
          return undefined;
        }
        const [generation, after] = State.beginFetch(before);
        yield* SubscriptionRef.set(state, after);
        yield* Effect.logDebug(
          `[coordinator] batch ${generation} (${reason}): ${before.symbols.join(", ")}`,
        );

        const done = yield* Deferred.make<Settled>();
        const batch = runFetchBatch(before.symbols, before.settings.timeRange).pipe(
          pool.withPermits(1),
          Effect.provide(context),
          Effect.flatMap((snapshots) =>
            Queue.offer(mailbox, {
              _tag: "BatchCompleted",
              generation,
              snapshots,
              done,
            }),
          ),
          Effect.catchAllCause((cause) =>
            Queue.offer(mailbox, {
              _tag: "BatchFailed",
              generation,
              cause: Cause.pretty(cause),
              done,
            }),
          ),
          Effect.onInterrupt(() => Deferred.succeed(done, "closed")),
        );
        yield* FiberSet.run(batches, batch);
        return { generation, settled: Deferred.await(done) };
      });

    const handle = (message: Message): Effect.Effect<void> => {
      switch (message._tag) {
        case "Run":
          return message.run;
        case "BatchCompleted":
          return Effect.gen(function* () {
            if (yield* Ref.get(closed)) {
              yield* Deferred.succeed(message.done, "closed");
              return;
            }
            const now = yield* Clock.currentTimeMillis;
            const merged = State.mergeBatch(
              yield* SubscriptionRef.get(state),
              message.generation,
              message.snapshots,
              now,
            );
            yield* SubscriptionRef.set(state, merged.state);
            if (merged.outcome === "stale") {
              yield* Effect.logDebug(
                `[coordinator] discarded stale batch ${message.generation}`,
              );
            }
            yield* Deferred.succeed(message.done, merged.outcome);
          });
        case "BatchFailed":
          return Effect.gen(function* () {
            if (yield* Ref.get(closed)) {
              yield* Deferred.succeed(message.done, "closed");
              return;
            }
            yield* Effect.logError(
              `[coordinator] batch ${message.generation} failed\n${message.cause}`,
            );
            yield* update(State.failBatch);
            yield* Deferred.succeed(message.done, "failed");
          });
      }
    };

    yield* Queue.take(mailbox).pipe(
      Effect.flatMap(handle),
      Effect.forever,
      Effect.forkScoped,
    );

    /** Run `effect` on the owner fiber and wait for its answer. */
    const onOwner = <A>(effect: Effect.Effect<A>, whenClosed: A) =>
      Effect.gen(function* () {
        const reply = yield* Deferred.make<A>();
        const run = Effect.gen(function* () {
          const value = (yield* Ref.get(closed)) ? whenClosed : yield* effect;
          yield* Deferred.succeed(reply, value);
        });
        yield* Queue.offer(mailbox, { _tag: "Run", run });
        return yield* Deferred.await(reply);
      });

    // --- Commands ---

    const fetchNow = (reason: FetchReason) =>
      onOwner(startBatch(reason), undefined);

    const addSymbol = (input: string) =>
      onOwner(
        Effect.gen(function* () {
          const result = State.addSymbol(yield* SubscriptionRef.get(state), input);
          yield* SubscriptionRef.set(state, result.state);
          if (result._tag !== "Added") return undefined;
          yield* Effect.logInfo(`[coordinator] added ${result.symbol}`);
          yield* persistSymbols(result.state.symbols);
          return yield* startBatch("symbols");
        }),
        undefined,
      );

    // Removal only redraws: the remaining snapshots are still current.
    const removeSymbol = (input: string) =>
      onOwner(
        Effect.gen(function* () {
          const result = State.removeSymbol(yield* SubscriptionRef.get(state), input);
          yield* SubscriptionRef.set(state, result.state);
          if (result._tag === "Removed") {
            yield* Effect.logInfo(`[coordinator] removed ${result.symbol}`);
            yield* persistSymbols(result.state.symbols);
          }
        }),
        undefined,
      );

    const applySettings = (settings: Settings) =>
      onOwner(
        Effect.gen(function* () {
          const result = State.applySettings(yield* SubscriptionRef.get(state), settings);
          yield* SubscriptionRef.set(state, result.state);
          yield* persistSettings(settings);
          return result.changed ? yield* startBatch("settings") : undefined;
        }),
        undefined,
      );

    const selectView = (view: State.View) =>
      onOwner(
        Effect.gen(function* () {
          yield* update((s) => State.selectView(s, view));
          const now = yield* SubscriptionRef.get(state);
          const opened =
            view._tag === "Detail" &&
            now.view._tag === "Detail" &&
            now.view.symbol === view.symbol;
          return opened ? yield* startBatch("view") : undefined;
        }),
        undefined,
      );

    const startAutoRefresh = Effect.gen(function* () {
      if (Option.isSome(yield* Ref.get(timer))) return;
      const fiber = yield* Effect.sleep(interval).pipe(
        Effect.zipRight(fetchNow("timer")),
        Effect.forever,
        Effect.forkScoped,
      );
      yield* Ref.set(timer, Option.some(fiber));
    });

    const shutdown = Effect.gen(function* () {
      if (yield* Ref.getAndSet(closed, true)) return;
      const running = yield* Ref.get(timer);
      if (Option.isSome(running)) {
        yield* Fiber.interrupt(running.value);
      }
      yield* Effect.forkDaemon(FiberSet.clear(batches));
      const last = yield* SubscriptionRef.get(state);
      yield* persistSymbols(last.symbols);
      yield* Effect.logDebug("[coordinator] shut down");
    });

    const scope = yield* Effect.scope;

    return RefreshCoordinator.of({
      current: SubscriptionRef.get(state),
      changes: state.changes,
      fetchNow,
      addSymbol,
      removeSymbol,
      toggleVisibility: (symbol) =>
        onOwner(update((s) => State.toggleVisibility(s, symbol)), undefined),
      sortBy: (column) =>
        onOwner(update((s) => State.sortBy(s, column)), undefined),
      applySettings,
      selectView,
      notify: (level, text) =>
        onOwner(update((s) => State.setNotice(s, level, text)), undefined),
      startAutoRefresh: startAutoRefresh.pipe(
        Effect.provideService(Scope.Scope, scope),
      ),
      shutdown,
    });
  });

const refreshIntervalConfig = Config.duration("REFRESH_INTERVAL").pipe(
  Config.withDefault(DEFAULT_REFRESH_INTERVAL),
);

export const RefreshCoordinatorLive = Layer.scoped(
  RefreshCoordinator,
  Effect.flatMap(refreshIntervalConfig, (refreshInterval) =>
    make({ refreshInterval }),
  ),
);
