import path from "node:path";
import { describe, expect, test } from "vitest";

import { createApp, createScorer, pipelineSettings } from "../src/app.js";
import { getConfig } from "../src/config.js";
import { buildCorpusFromSource } from "../src/corpus/buildIndex.js";
import { artifactPathFor } from "../src/corpus/registry.js";
import { runQuery } from "../src/rag/pipeline.js";
import { captureLogger, createFakeEmbedder, createScriptedChat, makeTempDir, writeFiles } from "./helpers.js";

describe("createApp", () => {
  test("wires config into a working pipeline with vector and audit sinks", async () => {
    const root = makeTempDir();
    const cfg = getConfig({ KB_DATA_DIR: root, KB_AUDIT_LOG_PATH: path.join(root, "audit.jsonl") });
    const embedder = createFakeEmbedder();
    writeFiles(path.join(root, "configs"), { "db.yaml": "database:\n  replicas: 2" });
    await buildCorpusFromSource({
      corpus: "configs",
      sourceDir: path.join(root, "configs"),
      artifactPath: artifactPathFor(cfg.indexDir, "configs"),
      embedder
    });

    const app = createApp(cfg, { embedder, chat: createScriptedChat(() => "Two replicas."), logger: captureLogger().logger });
    try {
      expect(app.registry.available()).toEqual(["configs"]);
      expect(app.writer.sinkKinds).toEqual(["vector", "audit"]);

      const res = await runQuery(app.deps, { user_query: "How many database replicas?", user_id: "alice" });
      expect(res.decision).toMatchObject({ kind: "corpus", corpus: "configs" });
      expect(res.answer).toBe("Two replicas.");
    } finally {
      await app.close();
    }
  });

  test("settings fall back to the global top-k for unknown corpora", () => {
    const settings = pipelineSettings(getConfig({ TOP_K_RETRIEVAL: "4" }));
    expect(settings.topKFor("docs")).toBe(6);
    expect(settings.topKFor("tickets")).toBe(8);
    expect(settings.topKFor("configs")).toBe(4);
    expect(settings.topKFor("wiki")).toBe(4);
  });

  test("router strategies map to scorers", () => {
    const chat = createScriptedChat(() => "{}");
    expect(createScorer("nearest", chat).name).toBe("nearest");
    expect(createScorer("centroid", chat).name).toBe("centroid");
    expect(createScorer("llm", chat).name).toBe("llm");
  });
});
