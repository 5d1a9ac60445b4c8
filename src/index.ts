import { Command, Option as CliOption } from "commander";
import { Effect, Either } from "effect";
import { chapters, listLatest, listSeries, resolveFormat, seriesDetails, updateCoverFromChapter } from "./catalog.ts";
import { LiveLayer } from "./effect/services.ts";
import { config } from "./config.ts";
import { log } from "./logging/index.ts";
import { createSeries, type SortOrder } from "./types.ts";

function print(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

const program = new Command();

program
  .name("local-shelf")
  .description("Catalog of the series stored under LIBRARY_ROOTS")
  .version("0.1.0");

program
  .command("series")
  .description("List series whose directory name contains the query")
  .argument("[query]", "case-insensitive substring of the series name", "")
  .addOption(new CliOption("-s, --sort <field>", "sort field").choices(["name", "date"]).default("name"))
  .option("-d, --desc", "sort descending", false)
  .action(async (query: string, options: { sort: string; desc: boolean }) => {
    const order: SortOrder = { index: options.sort === "date" ? 1 : 0, ascending: !options.desc };
    print(await Effect.runPromise(listSeries(query, order).pipe(Effect.provide(LiveLayer))));
  });

program
  .command("latest")
  .description("List series modified during the last 7 days")
  .action(async () => {
    print(await Effect.runPromise(listLatest().pipe(Effect.provide(LiveLayer))));
  });

program
  .command("details")
  .description("Show a series with its metadata file merged in")
  .argument("<series>", "series directory name")
  .action(async (name: string) => {
    print(await Effect.runPromise(seriesDetails(createSeries(name)).pipe(Effect.provide(LiveLayer))));
  });

program
  .command("chapters")
  .description("List the chapters of a series, newest first")
  .argument("<series>", "series directory name")
  .action(async (name: string) => {
    print(await Effect.runPromise(chapters(createSeries(name)).pipe(Effect.provide(LiveLayer))));
  });

program
  .command("format")
  .description("Show the container format of a chapter")
  .argument("<chapter>", "chapter url, <series>/<entry>")
  .action(async (url: string) => {
    const chapter = { url, name: url, chapterNumber: -1, dateUpload: 0 };
    const result = await Effect.runPromise(resolveFormat(chapter).pipe(Effect.either, Effect.provide(LiveLayer)));

    if (Either.isLeft(result)) {
      log.error("Format", result.left.message, result.left, { chapter: url });
      process.exitCode = 1;
      return;
    }
    print(result.right);
  });

program
  .command("cover")
  .description("Copy the cover of the earliest chapter into the series directory")
  .argument("<series>", "series directory name")
  .action(async (name: string) => {
    const series = createSeries(name);
    const copyCover = chapters(series).pipe(
      Effect.flatMap((list) => {
        const earliest = list.at(-1);
        return earliest ? updateCoverFromChapter(earliest, series) : Effect.succeed(null);
      }),
      Effect.either,
      Effect.provide(LiveLayer),
    );

    const result = await Effect.runPromise(copyCover);
    if (Either.isLeft(result)) {
      log.error("Cover", result.left.message, result.left, { series: name });
      process.exitCode = 1;
      return;
    }
    print({ cover: result.right });
  });

log.debug("Init", "Starting", { roots: config.roots.length });

program.parseAsync(process.argv).catch((error: unknown) => {
  log.error("Init", "Command failed", error);
  process.exitCode = 1;
});
