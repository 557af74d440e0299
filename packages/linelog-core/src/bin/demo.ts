/**
 * linelog 演示
 *
 * 用法：npm run demo
 * 环境变量 LINELOG_* 控制目录、时区等（见 loadPolicyOptionsFromEnv）。
 */

import { openPrintSessionFromEnv } from "../session.js";

const session = openPrintSessionFromEnv({ process });
const { print } = session;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function main(): Promise<void> {
  print("System initializing...");
  print.with({ end: "..." })("Loading modules");
  print("Done!");

  for (let pct = 0; pct <= 100; pct += 25) {
    print.with({ end: pct === 100 ? "\n" : "" })(`\rProgress: ${pct}%`);
    await sleep(100);
  }

  print.success("Database connected successfully.");
  print.warning("High latency detected:", "450ms");
  print.error("Connection dropped.");
  print.critical("System Failure! Shutting down.");
  print.debug("Variable state:", { x: 10, y: 20 });

  if (session.printer.logFilePath) {
    print.info("Log file:", session.printer.logFilePath);
  }

  if (process.argv.includes("--crash")) {
    throw new Error("Simulated crash");
  }
}

main()
  .then(() => session.close())
  .catch((err: unknown) => {
    process.stderr.write(`${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
    session.close();
    process.exitCode = 1;
  });
