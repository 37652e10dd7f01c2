export const MAX_COMMAND_LENGTH = 2000;

export const InteractRequestSchema = {
  type: "object",
  required: ["command"],
  properties: {
    command: { type: "string", minLength: 1, maxLength: MAX_COMMAND_LENGTH, pattern: "\\S" },
    options: { type: ["object", "null"] },
  },
  additionalProperties: false,
} as const;
