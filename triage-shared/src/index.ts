/**
 * Public API for triage-shared.
 */

// Issue model
export type {
  IssueStatus,
  IssueType,
  DependencyType,
  ReviewStatus,
  Dependency,
  IssueComment,
  Issue,
} from './types/issue';
export {
  ISSUE_STATUSES,
  ISSUE_TYPES,
  DEPENDENCY_TYPES,
  isOneOf,
  isIssueStatus,
  isIssueType,
  isDependencyType,
  isUnreviewed,
  parentIdsOf,
} from './types/issue';

// Review types
export type {
  ReviewType,
  ReviewOutcome,
  ReviewAction,
  SessionStats,
  ReviewSaveResult,
  ReviewSaver,
} from './types/review';
export { REVIEW_TYPES, isReviewType } from './types/review';

// Errors
export { IssueNotFoundError, IssueSourceError } from './errors';

// Sorting
export type { StatusOrderFn } from './sorting/hierarchicalId';
export {
  compareHierarchicalIds,
  compareByPriority,
  sortIssuesByPriority,
  sortIssuesByStatusThenPriority,
} from './sorting/hierarchicalId';

// Tree
export type {
  DisplayNode,
  StatusFilter,
  IssueFilterOptions,
  IssuePredicate,
  EpicProgress,
} from './tree/treeFlattener';
export {
  TREE_GLYPHS,
  STATUS_FILTER_CYCLE,
  buildChildrenMap,
  buildIssueFilter,
  flattenTree,
  countEpicChildren,
  countDescendants,
  nextStatusFilter,
} from './tree/treeFlattener';
export type { ReviewTree } from './tree/treeLoader';
export { buildIssueMap, loadReviewTree, treeIssues, blockingIdsOf } from './tree/treeLoader';

// Scope
export type { SelectorItemType, SelectorItem } from './scope/selectorItems';
export {
  buildEpicItems,
  buildLabelItems,
  buildSelectorItems,
  issueItem,
  lookupIssues,
} from './scope/selectorItems';
export { ScopeFilterEngine } from './scope/scopeFilter';

// Search
export type { FuzzyMatch, FuzzyMatcher, FuseMatcherOptions } from './search/fuzzyMatcher';
export { FuseMatcher } from './search/fuzzyMatcher';

// Review session
export type { ReviewSessionOptions } from './review/reviewSession';
export { NOTE_SEPARATOR, appendNote, ReviewSessionTracker } from './review/reviewSession';
export type { ParsedReview, LatestReview } from './review/reviewComment';
export {
  REVIEW_MARKER,
  REVIEW_END_MARKER,
  LEGACY_REVIEW_MARKER,
  formatReviewComment,
  parseReviewFromComment,
  getLatestReviewFromComments,
  seedReviewState,
} from './review/reviewComment';
export { EMPTY_SESSION_PROMPT, outcomeGlyph, generateSimplePrompt, generateFullPrompt } from './review/prompts';
export type { CommandRunner } from './review/savers';
export { runCommand, CommentReviewSaver, JsonReviewSaver } from './review/savers';

// Viewport
export type { ViewportState } from './viewport/viewport';
export { clampCursor, ensureVisible, moveCursor, setCursor, reconcile } from './viewport/viewport';

// Readers
export type { WarningHandler, JsonlEntry } from './readers/issues';
export {
  PREFERRED_JSONL_NAMES,
  pickJsonlFile,
  findJsonlPath,
  toIssue,
  parseIssues,
  loadIssuesFromFile,
  loadIssues,
} from './readers/issues';

// Config
export type { SaveTarget, ReviewConfig, ReviewConfigInput, ResolvedSaveTarget } from './config/reviewConfig';
export {
  DEFAULT_SAVE_TARGET,
  parseConfigFile,
  readConfigFile,
  configFromEnv,
  resolveReviewConfig,
  loadReviewConfig,
  resolveSaveTarget,
} from './config/reviewConfig';
export { getConfigDir, getConfigPath, getProjectDataPath, encodeWorkspacePath, getProjectSlug } from './paths';
