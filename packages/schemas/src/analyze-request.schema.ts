export const AnalyzeRequestSchema = {
  type: "object",
  required: ["issue_nodes"],
  properties: {
    issue_nodes: {
      type: "array",
      items: { type: "string", minLength: 1 },
      minItems: 1,
    },
  },
  additionalProperties: false,
} as const;
