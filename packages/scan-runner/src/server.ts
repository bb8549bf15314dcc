#!/usr/bin/env node
/**
 * MCP server for scan execution.
 *
 * Scans run as child processes of this server and are stopped when it
 * shuts down.
 */

import { mkdirSync } from "node:fs";
import { runServer, unwrap, type Logger } from "@scanwarden/core";
import { loadConfig } from "./config.js";
import type { ScanConfig } from "./core/model.js";
import { TaskScheduler } from "./core/TaskScheduler.js";
import { FileTemplateStore } from "./infrastructure/FileTemplateStore.js";
import { NodeProcessRunner } from "./infrastructure/NodeProcessRunner.js";
import { registerAllTools, type Services } from "./tools/index.js";

/**
 * Re-read the config file for every new task, keeping the last valid one
 * when the file became invalid.
 */
function configProvider(initial: ScanConfig, logger: Logger): () => ScanConfig {
  let current = initial;
  return () => {
    const loaded = loadConfig();
    if (loaded.ok) {
      current = loaded.value;
    } else {
      logger.warn("Config reload failed, using previous config", { error: loaded.error.message });
    }
    return current;
  };
}

runServer<Services>({
  config: {
    name: "scan-runner",
    version: "0.1.0",
  },
  createServices: (logger) => {
    const config = unwrap(loadConfig());
    mkdirSync(config.templatesDir, { recursive: true });
    logger.info("Scanner configured", { scanner: config.scannerPath, templates: config.templatesDir });

    return {
      scheduler: new TaskScheduler({
        runner: new NodeProcessRunner({ gracePeriodMs: config.gracePeriodMs, logger: logger.child("process") }),
        templates: new FileTemplateStore(config.templatesDir),
        config: configProvider(config, logger),
        logger,
      }),
    };
  },
  registerTools: registerAllTools,
  onShutdown: async ({ scheduler }, logger) => {
    const stopped = await scheduler.stopAll();
    logger.info("Shutdown complete", { stopped });
  },
});
