// Persistence — the symbol list and the settings as plain text files.
//
// Loading never fails: a missing or unreadable file yields the defaults,
// and malformed lines are skipped by the parsers.

import { FileSystem, Path } from "@effect/platform";
import type { PlatformError } from "@effect/platform/Error";
import { Config, Context, Effect, Layer, Option } from "effect";
import {
  defaultSettings,
  parseSettings,
  serializeSettings,
  type Settings,
} from "./settings.ts";
import {
  DEFAULT_SYMBOLS,
  parseSymbolList,
  serializeSymbolList,
} from "./symbols.ts";

export const SYMBOL_FILE = "my_stocks.txt";
export const SETTINGS_FILE = "settings.txt";

// --- Services ---

export class SymbolStore extends Context.Tag("SymbolStore")<
  SymbolStore,
  {
    readonly load: Effect.Effect<ReadonlyArray<string>>;
    readonly save: (
      symbols: ReadonlyArray<string>,
    ) => Effect.Effect<void, PlatformError>;
  }
>() {}

export class SettingsStore extends Context.Tag("SettingsStore")<
  SettingsStore,
  {
    readonly load: Effect.Effect<Settings>;
    readonly save: (settings: Settings) => Effect.Effect<void, PlatformError>;
  }
>() {}

// --- File-backed implementation ---

const dataDir = Config.string("SHARE_MONITOR_DATA_DIR").pipe(
  Config.withDefault("."),
);

const makeTextFile = (name: string) =>
  Effect.gen(function* () {
    const fs = yield* FileSystem.FileSystem;
    const path = yield* Path.Path;
    const file = path.join(yield* dataDir, name);

    const read: Effect.Effect<Option.Option<string>> = fs.exists(file).pipe(
      Effect.flatMap((exists) =>
        exists
          ? fs.readFileString(file).pipe(Effect.map(Option.some))
          : Effect.succeedNone,
      ),
      Effect.catchAll((e) =>
        Effect.logWarning(`[storage] cannot read ${file}: ${e.message}`).pipe(
          Effect.as(Option.none<string>()),
        ),
      ),
    );

    const write = (text: string) =>
      fs.writeFileString(file, text).pipe(
        Effect.tap(() => Effect.logDebug(`[storage] wrote ${file}`)),
      );

    return { read, write };
  });

export const SymbolStoreLive = Layer.effect(
  SymbolStore,
  Effect.gen(function* () {
    const file = yield* makeTextFile(SYMBOL_FILE);
    return SymbolStore.of({
      load: file.read.pipe(
        Effect.map(Option.match({
          onNone: () => DEFAULT_SYMBOLS,
          onSome: parseSymbolList,
        })),
      ),
      save: (symbols) => file.write(serializeSymbolList(symbols)),
    });
  }),
);

export const SettingsStoreLive = Layer.effect(
  SettingsStore,
  Effect.gen(function* () {
    const file = yield* makeTextFile(SETTINGS_FILE);
    return SettingsStore.of({
      load: file.read.pipe(
        Effect.map(Option.match({
          onNone: () => defaultSettings,
          onSome: parseSettings,
        })),
      ),
      save: (settings) => file.write(serializeSettings(settings)),
    });
  }),
);

export const StorageLive = Layer.merge(SymbolStoreLive, SettingsStoreLive);
