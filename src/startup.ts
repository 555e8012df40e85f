// Startup splash — progress steps with minimum-duration gates.
//
// The first fetch runs inside the splash. The data phase is shown for at
// least MIN_DATA_PHASE and the splash as a whole for at least MIN_SPLASH,
// measured on the Effect clock.

import { FileSystem, Path } from "@effect/platform";
import { Clock, Duration, Effect } from "effect";
import { BOLD, DIM, RESET } from "./format.ts";

export interface LoadingStep {
  readonly progress: number;
  readonly text: string;
}

export const LOADING_STEPS = {
  starting: { progress: 0, text: "Starting up..." },
  shares: { progress: 20, text: "Fetching Shares..." },
  data: { progress: 50, text: "Fetching Data..." },
  tape: { progress: 80, text: "Consulting the tape..." },
  complete: { progress: 100, text: "Load Complete" },
} as const satisfies Record<string, LoadingStep>;

export const MIN_DATA_PHASE = Duration.seconds(1);
export const MIN_SPLASH = Duration.seconds(7);

const sleepUntil = (deadline: number) =>
  Effect.flatMap(Clock.currentTimeMillis, (now) =>
    now < deadline ? Effect.sleep(Duration.millis(deadline - now)) : Effect.void,
  );

export const runSplash = <A, E, R>(
  load: Effect.Effect<A, E, R>,
  report: (step: LoadingStep) => Effect.Effect<void>,
): Effect.Effect<A, E, R> =>
  Effect.gen(function* () {
    const startedAt = yield* Clock.currentTimeMillis;
    yield* report(LOADING_STEPS.starting);
    yield* report(LOADING_STEPS.shares);

    const dataStartedAt = yield* Clock.currentTimeMillis;
    yield* report(LOADING_STEPS.data);
    const result = yield* load;
    yield* sleepUntil(dataStartedAt + Duration.toMillis(MIN_DATA_PHASE));

    yield* report(LOADING_STEPS.tape);
    yield* sleepUntil(startedAt + Duration.toMillis(MIN_SPLASH));

    yield* report(LOADING_STEPS.complete);
    yield* Effect.logDebug("[startup] splash complete");
    return result;
  });

/** `[██████░░░░] 60%  text` */
export function renderProgress(step: LoadingStep, width = 30): string {
  const filled = Math.round((step.progress / 100) * width);
  const bar = "█".repeat(filled) + "░".repeat(width - filled);
  return `[${bar}] ${String(step.progress).padStart(3)}%  ${DIM}${step.text}${RESET}`;
}

// --- Banner ---

export const BANNER_FALLBACK = "Share Monitor (Logo Missing)";

/** ASCII logo shipped in assets/, or a one-line fallback. */
export const loadBanner: Effect.Effect<
  string,
  never,
  FileSystem.FileSystem | Path.Path
> = Effect.gen(function* () {
  const fs = yield* FileSystem.FileSystem;
  const path = yield* Path.Path;
  const file = yield* path.fromFileUrl(
    new URL("../assets/logo.txt", import.meta.url),
  );
  return yield* fs.readFileString(file);
}).pipe(
  Effect.map((text) => text.trimEnd()),
  Effect.catchAll((e) =>
    Effect.logDebug(`[startup] logo unavailable: ${e.message}`).pipe(
      Effect.as(`${BOLD}${BANNER_FALLBACK}${RESET}`),
    ),
  ),
);
