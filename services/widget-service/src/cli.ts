#!/usr/bin/env node
import { loadEnv } from "./config";
import { errorMessage } from "./errors";
import { logger } from "./logger";
import { WidgetExecutor, createWidgetExecutor } from "./modules/widgetExecutor";
import { errorFragment } from "./templates";

/**
 * Render one widget and print its fragment. Resolves to the process exit code:
 * 1 only for a usage error, 0 whenever a fragment (possibly an error one) was printed.
 */
export async function main(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  if (args.length !== 1) {
    process.stderr.write("Usage: render-widget '<json_config>'\n");
    return 1;
  }

  let executor: WidgetExecutor;
  try {
    executor = createWidgetExecutor(loadEnv(env));
  } catch (err) {
    logger.error({ message: errorMessage(err) }, "render-widget could not be configured");
    process.stdout.write(`${errorFragment(`Widget execution failed: ${errorMessage(err)}`)}\n`);
    return 0;
  }

  const html = await executor.executeJson(args[0]);
  process.stdout.write(`${html}\n`);
  return 0;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      logger.error({ message: errorMessage(err) }, "render-widget failed");
      process.exitCode = 1;
    });
}
