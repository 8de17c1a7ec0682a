import { assertConfig, config } from "./config";
import { EnrichmentAgent } from "./agents/enrichmentAgent";
import { GenerationAgent } from "./agents/generationAgent";
import { SupervisedCommandRunner, TestAgent } from "./agents/testAgent";
import { EventGateway } from "./gateway/eventGateway";
import { startGatewayServer } from "./gateway/websocketServer";
import { OpenAiClient } from "./llm/openaiClient";
import { logger } from "./logger";
import { PipelineOrchestrator } from "./orchestrator/pipelineOrchestrator";
import { ProcessSupervisor } from "./services/processSupervisor";
import { ProjectLockManager } from "./services/projectLockManager";
import { ProjectStore } from "./services/projectStore";
import { RunStore } from "./services/runStore";
import { buildApp } from "./serverApp";

const runStore = new RunStore(
  { promptCostPer1k: config.promptCostPer1k, completionCostPer1k: config.completionCostPer1k },
  config.maxRetainedRuns
);
const projectStore = new ProjectStore();
const supervisor = new ProcessSupervisor();
const llm = new OpenAiClient();

const orchestrator = new PipelineOrchestrator({
  runStore,
  projectStore,
  supervisor,
  locks: new ProjectLockManager({ maxConcurrentRuns: config.maxConcurrentRuns, devPortBase: config.devPortBase }),
  enrichment: new EnrichmentAgent(llm),
  generation: new GenerationAgent(llm),
  tester: new TestAgent({ runner: new SupervisedCommandRunner(supervisor) })
});

const gateway = new EventGateway(orchestrator, runStore);
const app = buildApp({ orchestrator, runStore });

const start = async (): Promise<void> => {
  assertConfig();
  supervisor.installShutdownHooks({ signals: false });
  await Promise.all([llm.assertModelAvailable(config.enrichModel), llm.assertModelAvailable(config.buildModel)]);
  await app.listen({ port: config.port, host: config.host });
  const gatewayServer = await startGatewayServer(gateway, { port: config.gatewayPort, host: config.host });

  const stop = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, "shutting down");
    orchestrator
      .shutdown()
      .then(() => Promise.all([gatewayServer.close(), app.close()]))
      .catch((error: unknown) => logger.error({ err: error }, "shutdown failed"))
      .finally(() => process.exit(signal === "SIGINT" ? 130 : 143));
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
};

start().catch((error: unknown) => {
  logger.error({ err: error }, "failed to start");
  process.exit(1);
});
