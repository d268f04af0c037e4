import { runCli } from "./cli";
import { errorMessage } from "./core/errors";

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error(`fatal: ${errorMessage(error)}`);
  process.exitCode = 1;
});
