import { buildServer } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { errorFields, log } from "./logger.js";

const config = loadConfig();
const { server, db } = buildServer(config);

const controller = new AbortController();
for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    log({ level: "info", msg: "received signal", signal });
    controller.abort();
  });
}

try {
  await server.run(controller.signal);
  log({ level: "info", msg: "server stopped" });
} catch (err) {
  log({ level: "error", msg: "server failed", ...errorFields(err) });
  process.exitCode = 1;
} finally {
  await db?.end();
}
