import { readFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { loadConfig } from "../src/config/env.js";
import { createEngineState } from "../src/services/engineState.js";

const evalQuestionSchema = z.object({
  question: z.string(),
  expected_category: z.string(),
  expected_top_document: z.string().nullable(),
});

type EvalQuestion = z.infer<typeof evalQuestionSchema>;

async function main() {
  const state = await createEngineState(
    loadConfig({ ...process.env, RETRIEVAL_BACKEND: "tfidf", ANSWER_MODE: "template" }),
  );
  const questions = await loadQuestions();
  const rows: Array<{
    question: string;
    category: string;
    category_ok: boolean;
    top_document_ok: boolean;
    latency_ms: number;
  }> = [];

  for (const item of questions) {
    const result = await state.service.ask({ question: item.question });
    const topDocument = result.sources[0] ?? null;

    rows.push({
      question: item.question,
      category: result.category,
      category_ok: result.category === item.expected_category,
      top_document_ok:
        item.expected_top_document === null
          ? !result.context_used
          : topDocument === item.expected_top_document,
      latency_ms: result.latency_ms,
    });
  }

  const categoryAccuracy = ratio(rows.filter((row) => row.category_ok).length, rows.length);
  const topDocumentHitRate = ratio(rows.filter((row) => row.top_document_ok).length, rows.length);
  const avgLatencyMs =
    rows.length > 0 ? Math.round(rows.reduce((sum, row) => sum + row.latency_ms, 0) / rows.length) : 0;

  console.log("Evaluation Summary");
  console.log("==================");
  console.log(`index_type: ${state.engine.getStats().index_type}`);
  console.log(`questions: ${rows.length}`);
  console.log(`category_accuracy: ${categoryAccuracy}`);
  console.log(`top_document_hit_rate: ${topDocumentHitRate}`);
  console.log(`avg_latency_ms: ${avgLatencyMs}`);
  console.log("");
  console.log("Per Question");
  console.log("------------");
  for (const row of rows) {
    console.log(
      `- ${row.question} | category=${row.category} (${row.category_ok}) | top=${row.top_document_ok} | latency=${row.latency_ms}ms`,
    );
  }

  await state.close();
}

async function loadQuestions(): Promise<EvalQuestion[]> {
  const raw = await readFile(path.resolve("eval/questions.json"), "utf-8");
  return z.array(evalQuestionSchema).parse(JSON.parse(raw));
}

function ratio(hit: number, total: number): string {
  if (total === 0) {
    return "0.00";
  }
  return (hit / total).toFixed(2);
}

main().catch((error: unknown) => {
  console.error("Evaluation failed:", error);
  process.exit(1);
});
