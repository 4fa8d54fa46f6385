import { FatalError } from "../errors.js";
import { PipelineGraph } from "./graph.js";
import { defineStage, type PipelineOutputs, type StageContext, type StageDefinition } from "./types.js";

export const STAGES = {
  research: "research",
  structure: "structure",
  write: "write",
  image: "image",
} as const;

function requireOutput<K extends keyof PipelineOutputs>(ctx: StageContext, key: K): NonNullable<PipelineOutputs[K]> {
  const value = ctx.outputs[key];
  if (value === undefined || value === null) {
    throw new FatalError("DEPENDENCY_FAILED", `Upstream output "${key}" is missing`);
  }
  return value;
}

const byIndex = <T extends { index: number }>(a: T, b: T): number => a.index - b.index;

export const researchStage = defineStage({
  name: STAGES.research,
  role: "research",
  dependsOn: [],
  required: true,
  units: (ctx) => [{ topic: ctx.topic, templateKind: ctx.config.templateKind }],
  merge: (results) => {
    const [first] = results;
    if (!first) throw new FatalError("MERGE_FAILED", "Research produced no findings");
    return { findings: first.value };
  },
});

export const structureStage = defineStage({
  name: STAGES.structure,
  role: "structure",
  dependsOn: [STAGES.research],
  required: true,
  units: (ctx) => [
    {
      topic: ctx.topic,
      templateKind: ctx.config.templateKind,
      maxSections: ctx.config.maxSections,
      findings: requireOutput(ctx, "findings"),
    },
  ],
  merge: (results, ctx) => {
    const [first] = results;
    if (!first) throw new FatalError("MERGE_FAILED", "Structuring produced no outline");
    const outline = first.value;
    return { outline: { ...outline, sections: outline.sections.slice(0, ctx.config.maxSections) } };
  },
});

/** One unit per outline section. */
export const writeStage = defineStage({
  name: STAGES.write,
  role: "write",
  dependsOn: [STAGES.structure],
  required: true,
  units: (ctx) => {
    const outline = requireOutput(ctx, "outline");
    const findings = requireOutput(ctx, "findings");
    return outline.sections.map((section) => ({
      topic: ctx.topic,
      templateKind: ctx.config.templateKind,
      section,
      findings,
    }));
  },
  merge: (results) => ({ contentBlocks: [...results].sort(byIndex).map((r) => r.value) }),
});

/** One unit per section that carries an image prompt. Failures only drop that image. */
export const imageStage = defineStage({
  name: STAGES.image,
  role: "image",
  dependsOn: [STAGES.structure],
  required: false,
  enabled: (ctx) => ctx.config.includeImages,
  units: (ctx) =>
    requireOutput(ctx, "outline").sections.flatMap((section) =>
      section.imagePrompt ? [{ sectionId: section.id, prompt: section.imagePrompt, style: ctx.config.imageStyle }] : [],
    ),
  merge: (results) => ({ imageRefs: [...results].sort(byIndex).map((r) => r.value) }),
});

export function documentStages(): StageDefinition[] {
  return [researchStage, structureStage, writeStage, imageStage];
}

/** research → structure → {write, image}; assembly runs once the graph settles. */
export function createDocumentPipeline(): PipelineGraph {
  return new PipelineGraph(documentStages());
}
