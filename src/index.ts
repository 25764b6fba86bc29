import { getConfig, isApifyConfigured, isLlmConfigured, loadEnv } from "./config";
import { buildServer, getListenAddress } from "./server";

async function main() {
  loadEnv();
  const config = getConfig();

  const server = await buildServer({ config });
  if (!isLlmConfigured(config) || !isApifyConfigured(config)) {
    server.log.warn(
      { llm: isLlmConfigured(config), apify: isApifyConfigured(config) },
      "credentials missing, workflow runs will fail until LLM_API_KEY and APIFY_API_TOKEN are set",
    );
  }

  await server.listen(getListenAddress(config));
  server.log.info({ port: config.port, model: config.llmModel }, "social post engine started");
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
