export { PromptTemplate } from './PromptTemplate';
export { PromptLoader, type PromptManifest } from './PromptLoader';
export {
  MATCH_EVALUATION_PROMPT,
  LOCATION_ADJUDICATION_PROMPT,
  type MatchPromptSlot,
  type LocationPromptSlot,
} from './templates';
