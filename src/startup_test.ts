import { FileSystem, Path } from "@effect/platform";
import { SystemError } from "@effect/platform/Error";
import {
  Clock,
  type Duration,
  Effect,
  Fiber,
  TestClock,
  TestContext,
} from "effect";
import { expect, test } from "vitest";
import { BOLD, DIM, RESET } from "./format.ts";
import {
  BANNER_FALLBACK,
  LOADING_STEPS,
  loadBanner,
  type LoadingStep,
  renderProgress,
  runSplash,
} from "./startup.ts";

// --- Helpers ---

/** Run the splash around a load that takes `loadFor`, returning each
 *  reported step with the clock time it was shown at. */
function splashTimeline(loadFor: Duration.DurationInput) {
  return Effect.runPromise(
    Effect.gen(function* () {
      const shown: Array<readonly [string, number]> = [];
      const report = (step: LoadingStep) =>
        Effect.flatMap(Clock.currentTimeMillis, (now) =>
          Effect.sync(() => {
            shown.push([step.text, now]);
          }),
        );
      const fiber = yield* Effect.fork(
        runSplash(Effect.as(Effect.sleep(loadFor), "loaded"), report),
      );
      yield* TestClock.adjust("20 seconds");
      const result = yield* Fiber.join(fiber);
      return { result, shown };
    }).pipe(Effect.provide(TestContext.TestContext)),
  );
}

// --- runSplash ---

test("runSplash: a fast load still shows the data step and the full splash", async () => {
  const { result, shown } = await splashTimeline("0 millis");
  expect(result).toBe("loaded");
  expect(shown).toEqual([
    ["Starting up...", 0],
    ["Fetching Shares...", 0],
    ["Fetching Data...", 0],
    ["Consulting the tape...", 1_000],
    ["Load Complete", 7_000],
  ]);
});

test("runSplash: the tape step follows a load slower than the data gate", async () => {
  const { shown } = await splashTimeline("3 seconds");
  expect(shown.slice(3)).toEqual([
    ["Consulting the tape...", 3_000],
    ["Load Complete", 7_000],
  ]);
});

test("runSplash: a load past the splash minimum completes straight away", async () => {
  const { shown } = await splashTimeline("9 seconds");
  expect(shown.slice(3)).toEqual([
    ["Consulting the tape...", 9_000],
    ["Load Complete", 9_000],
  ]);
});

// --- renderProgress ---

test("renderProgress: bar, percentage and step text", () => {
  expect(renderProgress(LOADING_STEPS.data, 10)).toBe(
    `[█████░░░░░]  50%  ${DIM}Fetching Data...${RESET}`,
  );
  expect(renderProgress(LOADING_STEPS.complete, 4)).toBe(
    `[████] 100%  ${DIM}Load Complete${RESET}`,
  );
});

// --- loadBanner ---

function banner(readFileString: FileSystem.FileSystem["readFileString"]) {
  return Effect.runPromise(
    loadBanner.pipe(
      Effect.provide(FileSystem.layerNoop({ readFileString })),
      Effect.provide(Path.layer),
    ),
  );
}

test("loadBanner: logo text without trailing blank lines", async () => {
  expect(await banner(() => Effect.succeed("SHARE\nMONITOR\n\n"))).toBe("SHARE\nMONITOR");
});

test("loadBanner: a missing logo falls back to the title", async () => {
  const missing = (path: string) =>
    Effect.fail(
      new SystemError({
        reason: "NotFound",
        module: "FileSystem",
        method: "readFileString",
        pathOrDescriptor: path,
      }),
    );
  expect(await banner(missing)).toBe(`${BOLD}${BANNER_FALLBACK}${RESET}`);
});
