/* eslint-disable no-console */
import "dotenv/config";

import { diag, DiagConsoleLogger } from "@opentelemetry/api";
import { toDiagLogLevel } from "@pipeline-trace/core";

import { loadServiceConfig } from "./config";
import { createService } from "./service";

function main(): void {
  const config = loadServiceConfig();
  diag.setLogger(new DiagConsoleLogger(), toDiagLogLevel(config.logLevel));

  const service = createService({ config });
  const server = service.app.listen(config.port, () => {
    service.logger.info(
      `⚡️[server]: ${config.serviceName} is running at http://localhost:${config.port}`,
    );
  });

  const shutdown = (signal: NodeJS.Signals) => {
    service.logger.info(`Received ${signal}, shutting down`);
    server.close((error) => {
      if (error) {
        diag.error("Failed to close the HTTP server", error);
      }
    });
    void service.shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        diag.error("Failed to flush spans on shutdown", error);
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

try {
  main();
} catch (error) {
  console.error("Failed to start the complex operation service:", error);
  process.exitCode = 1;
}
