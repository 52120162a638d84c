/**
 * Pipeline modules export
 */

import { collect } from "./collector";
import { extract } from "./extractor";
import { download } from "./downloader";
import { store } from "./storer";
import { analyze } from "./analyzer";
import { stats } from "./stats";
import type { PipelineContext } from "../types";

export { collect, extract, download, store, analyze, stats };

export type Stage = "collect" | "extract" | "download" | "store" | "analyze";

const STAGES: Array<[Stage, (ctx: PipelineContext) => Promise<void>]> = [
  ["collect", collect],
  ["extract", extract],
  ["download", download],
  ["store", store],
  ["analyze", analyze],
];

/**
 * Run every stage in order. A run that finds no image URLs stops after
 * extraction without error.
 */
export async function run(
  ctx: PipelineContext,
  onStage: (stage: Stage) => void = () => {},
): Promise<void> {
  for (const [name, stage] of STAGES) {
    onStage(name);
    await stage(ctx);
    if (name === "extract" && ctx.urls?.length === 0) return;
  }
}
