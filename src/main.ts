import { runCli } from "@/interfaces/cli/scraperCli";

runCli(process.argv)
  .then((exitCode) => process.exit(exitCode))
  .catch((error: unknown) => {
    console.error("Unexpected error:", error);
    process.exit(1);
  });
