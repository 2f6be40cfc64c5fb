import { z } from 'zod';
import type { ActCommand } from '../domain/brain/robodog-brain.js';
import { DEFAULT_CONFIDENCE, DEFAULT_MOOD, DEFAULT_REWARD_BIAS } from '../domain/brain/robodog-brain.js';

export const ActInputSchema = z
  .object({
    text: z.string().trim().min(1),
    confidence: z.number().min(0).max(1).default(DEFAULT_CONFIDENCE),
    reward_bias: z.number().min(0).max(1).default(DEFAULT_REWARD_BIAS),
    mood: z.number().min(-1).max(1).default(DEFAULT_MOOD),
  })
  .transform(
    (input): ActCommand => ({
      text: input.text,
      confidence: input.confidence,
      rewardBias: input.reward_bias,
      mood: input.mood,
    })
  );
