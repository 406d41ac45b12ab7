/**
 * ThoughtEvaluator: hybrid scoring of intermediate thoughts.
 *
 * score = heuristicWeight * heuristic(thought) + modelWeight * judge(thought),
 * clamped to [0, 1]. The judge is a critical-reviewer prompt answered with a
 * single number. Neither part ever throws: a failed judge call scores 0.5.
 */

import { Script } from 'node:vm';
import ts from 'typescript';
import type { LLMProvider } from '../../providers/types.js';
import { countWords } from '../../utils/tokens.js';
import { getLogger } from '../../core/logger.js';


const NEUTRAL_SCORE = 0.5;

const ACTION_KEYWORDS = [
  'implement', 'add', 'create', 'fix', 'refactor', 'test', 'validate', 'check',
  'update', 'remove', 'replace', 'extract', 'handle', 'call', 'return', 'parse',
  'import', 'modify', 'rename', 'move',
];
const MAX_KEYWORD_MATCHES = 4;
const KEYWORD_BONUS = 0.05;

const SEQUENCE_MARKER = /\b(first|second|third|then|next|finally|afterwards)\b|^\s*(step\s+)?\d+[.):]/im;
const FENCED_SNIPPET = /```([\w-]*)\n([\s\S]*?)```/g;

export interface ThoughtEvaluatorOptions {
  heuristicWeight?: number;
  modelWeight?: number;
  verifierModel?: string;
  temperature?: number;
}

function clamp01(value: number): number {
  if (Number.isNaN(value)) return NEUTRAL_SCORE;
  return Math.max(0, Math.min(1, value));
}

type SnippetCheck = (code: string) => boolean;

/**
 * Compile without running. Any SyntaxError marks the snippet invalid.
 */
function isValidJavaScript(code: string): boolean {
  try {
    new Script(code, { filename: 'thought-snippet.js' });
    return true;
  } catch {
    return false;
  }
}

/**
 * Syntactic diagnostics only: unresolved names and types are not errors here.
 */
function typeScriptCheck(fileName: string): SnippetCheck {
  return (code) => {
    const output = ts.transpileModule(code, {
      fileName,
      reportDiagnostics: true,
      compilerOptions: {
        target: ts.ScriptTarget.ES2022,
        jsx: ts.JsxEmit.Preserve,
        moduleDetection: ts.ModuleDetectionKind.Force,
      },
    });
    return (output.diagnostics ?? []).length === 0;
  };
}

const SNIPPET_CHECKS: Record<string, SnippetCheck> = {
  js: isValidJavaScript,
  javascript: isValidJavaScript,
  mjs: isValidJavaScript,
  cjs: isValidJavaScript,
  ts: typeScriptCheck('thought-snippet.ts'),
  typescript: typeScriptCheck('thought-snippet.ts'),
  tsx: typeScriptCheck('thought-snippet.tsx'),
  jsx: typeScriptCheck('thought-snippet.tsx'),
};

/**
 * Validity of each fenced snippet in a language we can parse. Untagged
 * snippets and other languages are left out.
 */
function checkSnippets(thought: string): boolean[] {
  const results: boolean[] = [];
  for (const [, tag, code] of thought.matchAll(FENCED_SNIPPET)) {
    const check = SNIPPET_CHECKS[tag.toLowerCase()];
    if (check) results.push(check(code));
  }
  return results;
}

/**
 * Rule-based score for a thought, starting from 0.5.
 */
export function scoreThoughtHeuristic(thought: string): number {
  let score = 0.5;

  const words = countWords(thought);
  if (words >= 5 && words <= 50) score += 0.1;
  else if (words < 3) score -= 0.2;

  const lower = thought.toLowerCase();
  const matches = ACTION_KEYWORDS.filter((kw) => new RegExp(`\\b${kw}\\b`).test(lower)).length;
  score += Math.min(matches, MAX_KEYWORD_MATCHES) * KEYWORD_BONUS;

  const snippets = checkSnippets(thought);
  if (snippets.length > 0) {
    score += snippets.every(Boolean) ? 0.1 : -0.1;
  }

  if (SEQUENCE_MARKER.test(thought)) score += 0.1;

  return clamp01(score);
}

/**
 * Pull a score out of a judge reply. Accepts 0-1 directly, and 0-10 scaled down.
 */
export function parseJudgeScore(content: string): number | null {
  const match = content.match(/-?\d+(?:\.\d+)?/);
  if (!match) return null;

  const value = Number(match[0]);
  if (Number.isNaN(value)) return null;
  if (value > 1 && value <= 10) return value / 10;
  return clamp01(value);
}

export class ThoughtEvaluator {
  private provider: LLMProvider;
  private heuristicWeight: number;
  private modelWeight: number;
  private verifierModel: string | undefined;
  private temperature: number;
  private logger = getLogger();

  constructor(provider: LLMProvider, options: ThoughtEvaluatorOptions = {}) {
    this.provider = provider;
    this.heuristicWeight = options.heuristicWeight ?? 0.4;
    this.modelWeight = options.modelWeight ?? 0.6;
    this.verifierModel = options.verifierModel;
    this.temperature = options.temperature ?? 0.2;
  }

  async evaluate(thought: string): Promise<number> {
    const heuristic = scoreThoughtHeuristic(thought);
    const judged = await this.judge(thought);
    const score = clamp01(this.heuristicWeight * heuristic + this.modelWeight * judged);

    this.logger.debug({ heuristic, judged, score }, 'ThoughtEvaluator: thought scored');
    return score;
  }

  /**
   * Ask the verifier model for a single numeric score. 0.5 on any failure.
   */
  async judge(thought: string): Promise<number> {
    const systemPrompt = `You are a critical senior code reviewer. Judge whether the proposed step is a sound, concrete move toward solving the problem. Be strict: vague, redundant or risky steps score low.

Respond with ONLY a single number between 0 and 1. Do not include any other text.`;

    try {
      const response = await this.provider.complete({
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: `## Proposed step\n${thought}` },
        ],
        model: this.verifierModel,
        temperature: this.temperature,
        maxTokens: 16,
      });

      const parsed = parseJudgeScore(response.content);
      if (parsed === null) {
        this.logger.warn({ content: response.content.substring(0, 100) }, 'ThoughtEvaluator: unparseable judge reply, using neutral score');
        return NEUTRAL_SCORE;
      }
      return parsed;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.warn({ error: message }, 'ThoughtEvaluator: judge call failed, using neutral score');
      return NEUTRAL_SCORE;
    }
  }
}
