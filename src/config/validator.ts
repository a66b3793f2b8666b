import { z } from 'zod';

const AgentSettingsSchema = z.object({
  max_tokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
});

export const ConfigSchema = z.object({
  llm: z.object({
    base_url: z.string().url(),
    api_key: z.string().min(1, 'LLM API key is required (any placeholder for local servers)'),
    model: z.string().min(1),
    timeout_ms: z.number().int().positive(),
    max_retries: z.number().int().min(1),
  }),
  agents: z.object({
    planner: AgentSettingsSchema,
    coder: AgentSettingsSchema,
    tester: AgentSettingsSchema,
    reviewer: AgentSettingsSchema,
  }),
  workflow: z
    .object({
      max_coder_tester_retries: z.number().int().min(0),
      max_reviewer_retries: z.number().int().min(0),
      max_steps: z.number().int().positive(),
      test_pass_threshold: z.number().min(0).max(100),
      review_approval_threshold: z.number().min(0).max(100),
      max_error_context: z.number().int().min(0),
      /** Language assumed for untagged code regions */
      default_language: z.string().min(1),
    })
    .refine((w) => w.max_reviewer_retries > w.max_coder_tester_retries, {
      message: 'max_reviewer_retries must be larger than max_coder_tester_retries',
      path: ['max_reviewer_retries'],
    }),
  workspace: z.object({
    root: z.string().min(1),
    checkpoint_dir: z.string().min(1),
  }),
  commands: z.object({
    python: z.string().min(1),
    test_args: z.array(z.string()),
    timeout_ms: z.number().int().positive(),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type AgentSettings = z.infer<typeof AgentSettingsSchema>;
