export const JournalEventSchema = {
  type: "object",
  required: ["event_id", "seq", "timestamp", "session_id", "type", "payload"],
  properties: {
    event_id: { type: "string", minLength: 1 },
    seq: { type: "integer", minimum: 0 },
    timestamp: { type: "string", format: "date-time" },
    session_id: { type: "string", minLength: 1 },
    type: {
      type: "string",
      enum: [
        "session.created",
        "graph.generated", "graph.rejected",
        "analysis.completed", "analysis.failed",
      ],
    },
    payload: { type: "object" },
    hash_prev: { type: "string" },
  },
  additionalProperties: false,
} as const;
