import { MAX_NODE_COUNT, MAX_SEED, MIN_MAX_DEPTH, MIN_NODE_COUNT } from "./types.js";

export const SynthesizeParamsSchema = {
  type: "object",
  required: ["node_count", "max_depth"],
  properties: {
    node_count: { type: "integer", minimum: MIN_NODE_COUNT, maximum: MAX_NODE_COUNT },
    max_depth: { type: "integer", minimum: MIN_MAX_DEPTH },
    seed: { type: "integer", minimum: 0, maximum: MAX_SEED },
  },
  additionalProperties: false,
} as const;
