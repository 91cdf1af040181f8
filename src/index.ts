import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadPipelineConfig } from "./config/pipelineConfig.js";
import { createGatewayServer } from "./mcp/gatewayServer.js";
import { DEFAULT_CONFIG_PATH, autoSchemaFromEnv, createRuntime } from "./runtime.js";

async function main(): Promise<void> {
  const configPath = process.env.PIPELINE_CONFIG_PATH ?? DEFAULT_CONFIG_PATH;
  const loaded = await loadPipelineConfig(configPath);
  const databaseUrl = process.env.DATABASE_URL;

  const runtime = await createRuntime({
    loaded,
    ...(databaseUrl ? { databaseUrl } : {}),
    autoSchema: autoSchemaFromEnv()
  });

  const server = createGatewayServer(runtime);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error(`variantflow gateway ready (work_dir=${loaded.config.paths.work_dir})`);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
