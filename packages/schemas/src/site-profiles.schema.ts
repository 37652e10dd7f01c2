const selector = { type: "string", minLength: 1, maxLength: 500 } as const;

export const SiteProfileSchema = {
  type: "object",
  required: ["host"],
  properties: {
    host: { type: "string", pattern: "^[a-z0-9-]+(\\.[a-z0-9-]+)+$" },
    login_url: { type: "string", format: "uri" },
    username_selector: selector,
    password_selector: selector,
    submit_selector: selector,
    search_selector: selector,
    search_url: { type: "string", pattern: "^https?://.*\\{query\\}" },
    login_link_texts: { type: "array", items: { type: "string", minLength: 1 } },
    challenge_selectors: { type: "array", items: selector },
    credentials_env: {
      type: "object",
      required: ["username", "password"],
      properties: {
        username: { type: "string", pattern: "^[A-Z_][A-Z0-9_]*$" },
        password: { type: "string", pattern: "^[A-Z_][A-Z0-9_]*$" },
      },
      additionalProperties: false,
    },
  },
  additionalProperties: false,
} as const;

export const SiteProfilesSchema = {
  type: "object",
  required: ["profiles"],
  properties: {
    profiles: { type: "array", items: SiteProfileSchema },
  },
  additionalProperties: false,
} as const;
