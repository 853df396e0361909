import { AnonymizationEngine } from "./anonymizationEngine.js";
import { createApp } from "./app.js";
import { loadConfig, loadPolicyFile } from "./config.js";
import { PresidioRecognizer } from "./recognizer.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const policyTable = config.policyFile ? await loadPolicyFile(config.policyFile) : undefined;

  const engine = new AnonymizationEngine({
    recognizer: new PresidioRecognizer({ baseUrl: config.presidioUrl, timeoutMs: config.presidioTimeoutMs }),
    defaultLanguage: config.defaultLanguage,
    defaultScoreThreshold: config.confidenceThreshold,
    defaultEntities: config.defaultEntities,
    policyTable,
    encryptionKey: config.encryptionKey,
    batchConcurrency: config.batchConcurrency,
    maxTextLength: config.maxTextLength
  });

  const app = createApp({ engine, config });

  app.listen(config.port, config.host, () => {
    console.log(`[Server] PII anonymizer listening on http://${config.host}:${config.port}`, {
      presidio_url: config.presidioUrl,
      default_language: config.defaultLanguage,
      confidence_threshold: config.confidenceThreshold,
      encryption_key_configured: config.encryptionKey !== undefined,
      policy_file: config.policyFile ?? null,
      node_env: config.nodeEnv
    });
  });
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error("[Server] FATAL: startup failed:", message);
  process.exit(1);
});
