// Body Measurement Pipeline - Entry point
// Loads configuration, wires the pipeline and starts the server.

import "dotenv/config";
import { realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { loadConfig, loadMeasurementPlan, loadReferenceMesh } from "./config.js";
import { createAppServer } from "./server.js";
import { SessionManager } from "./session-manager.js";
import { CalibrationEngine } from "./calibration-engine.js";
import { MeasurementEngine } from "./measurement-engine.js";
import { FilePersistence } from "./file-persistence.js";
import { createConsoleLogger } from "./logger.js";

export const APP_NAME = "Body Measurement Pipeline";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

export async function main(): Promise<void> {
  const config = loadConfig();
  logInit("Configuration loaded");

  logInit(`Loading measurement plan (${config.measurementPlanPath})...`);
  const plan = await loadMeasurementPlan(config.measurementPlanPath);

  logInit(`Loading reference mesh (${config.referenceMeshPath})...`);
  const meshMetadata = await loadReferenceMesh(config.referenceMeshPath);

  logInit(`Initializing FilePersistence (${config.outputDir}/)...`);
  const store = new FilePersistence(config.outputDir);

  logInit("Wiring SessionManager pipeline...");
  const sessionManager = new SessionManager({
    plan,
    meshMetadata,
    store,
    calibrationEngine: new CalibrationEngine(config.minPixelDistance),
    measurementEngine: new MeasurementEngine({ accuracyThreshold: config.accuracyThreshold }),
    logger: createConsoleLogger("SessionManager"),
    minConfidence: config.minConfidence,
    conflictTolerance: config.conflictTolerance,
    gracePeriodMs: config.gracePeriodMs,
    maxRetakes: config.maxRetakes,
  });

  const server = createAppServer({ sessionManager, store });
  await server.listen(config.port);

  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
  logInit("Pipeline: Validate → Calibrate → Measure → Aggregate → Review → Mesh");
  logInit("Ready for connections");
}

function isEntryPoint(): boolean {
  const script = process.argv[1];
  if (!script) return false;
  try {
    return realpathSync(script) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((err: unknown) => {
    logFatal(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
}
