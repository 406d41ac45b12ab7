export {
  WinningPathStore,
  winningPathFileName,
  formatRunTimestamp,
} from './winning-path-store.js';
export {
  InMemoryExperienceRepository,
  toAgentExperience,
  toProblemType,
  PROBLEM_TYPES,
} from './experience.js';
export type { AgentExperience, ExperienceRepository, ProblemType } from './experience.js';
