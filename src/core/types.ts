import { z } from 'zod';

// ===== Search configuration =====

export const MCTSConfigSchema = z.object({
  maxIterations: z.number().int().min(1).default(10),
  maxDepth: z.number().int().min(1).default(3),
  explorationConstant: z.number().min(0).default(1.414),
  /** Branching factor k: thoughts requested per expansion. */
  strategiesPerExpansion: z.number().int().min(1).default(3),
  thoughtEvalThreshold: z.number().min(0).max(1).default(0.5),
  earlyStopThreshold: z.number().min(0).max(1).default(0.9),
  enableEarlyGiveup: z.boolean().default(true),
  earlyGiveupIterations: z.number().int().min(0).default(5),
  earlyGiveupThreshold: z.number().min(0).max(1).default(0.3),
  maxTotalTokens: z.number().int().min(0).default(100_000),
  maxCostUsd: z.number().min(0).default(5.0),
  costPer1kTokens: z.number().min(0).default(0.01),
  seed: z.number().int().optional(),
  generatorModel: z.string().default('unknown'),
});

export type MCTSConfig = z.infer<typeof MCTSConfigSchema>;
export type MCTSConfigInput = z.input<typeof MCTSConfigSchema>;

// ===== Package configuration =====

export const LatsConfigSchema = z.object({
  search: MCTSConfigSchema.default({}),
  reflexion: z.object({
    enabled: z.boolean().default(true),
  }).default({}),
  persistence: z.object({
    saveWinningPaths: z.boolean().default(true),
    winningPathDir: z.string().default('data/lats/winning_paths'),
    /** Debug-only tree snapshot; written when the logger is at debug level. */
    treeDumpPath: z.string().optional(),
  }).default({}),
  evaluator: z.object({
    heuristicWeight: z.number().min(0).max(1).default(0.4),
    modelWeight: z.number().min(0).max(1).default(0.6),
    verifierModel: z.string().optional(),
    temperature: z.number().min(0).max(2).default(0.2),
  }).default({}),
  logging: z.object({
    verbose: z.boolean().default(false),
  }).default({}),
});

export type LatsConfig = z.infer<typeof LatsConfigSchema>;
export type LatsConfigInput = z.input<typeof LatsConfigSchema>;
