import WebArchiveCommand from "./cli";

const exitCodeOf = (error: unknown) =>
  typeof error === "object" &&
  error !== null &&
  "exitCode" in error &&
  typeof error.exitCode === "number"
    ? error.exitCode
    : 1;

WebArchiveCommand.run(process.argv.slice(2), import.meta.url).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(exitCodeOf(error));
});
