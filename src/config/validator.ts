import { z } from 'zod';
import { SUMMARY_MARGIN } from '../memory/history-compactor';

const positiveInt = z.coerce.number().int().positive();
const ratio = z.coerce.number().min(0).max(1);

export const ConfigSchema = z.object({
  llm: z.object({
    api_key: z.string().optional(),
    base_url: z.string().url(),
    model: z.string().min(1),
    temperature: z.coerce.number().min(0).max(2),
    timeout_ms: positiveInt,
  }),
  tools: z.object({
    endpoint: z.string().url(),
    timeout_ms: positiveInt,
  }),
  agent: z.object({
    max_steps: positiveInt,
    max_retries: z.coerce.number().int().min(0),
    progress_cadence: z.coerce.number().int().min(0),
    report_cadence: z.coerce.number().int().min(0),
    low_progress_threshold: ratio,
    stuck_limit: z.coerce.number().int().min(0),
    quality_threshold: ratio,
    minimal_guidance_after_step: z.coerce.number().int().min(0),
    critical_actions: z.array(z.string().min(1)),
    auto_approve: z.array(z.string().min(1)),
    ask_user_action: z.string().min(1),
  }),
  memory: z
    .object({
      max_tokens: positiveInt,
      pre_threshold: positiveInt,
      keep_recent: positiveInt,
      max_summary_tokens: positiveInt,
    })
    .refine((m) => m.pre_threshold < m.max_tokens, { message: 'pre_threshold must be below max_tokens', path: ['pre_threshold'] })
    .refine((m) => m.max_summary_tokens + SUMMARY_MARGIN < m.pre_threshold, {
      message: `max_summary_tokens must be more than ${SUMMARY_MARGIN} below pre_threshold`,
      path: ['max_summary_tokens'],
    }),
  storage: z.object({
    dir: z.string().min(1),
  }),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type Config = z.infer<typeof ConfigSchema>;
