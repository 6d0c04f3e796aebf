export { generateContext, writeDocument, resolveRoot, loadIgnorePatterns } from './generate.js';
export type { ContextSettings, GenerateRequest, ContextResult, IgnoreFile } from './generate.js';
export { nodeFs } from './fs.js';
export type { ContextFs } from './fs.js';

// Rules
export {
    createRuleSet, withMaxChars, isDirectoryExcluded, isFileIncluded,
    extensionOf, normalizeExtension,
} from './rules.js';
export type { RuleSet, RuleSetInput } from './rules.js';

// Walking
export { walk, compareNames } from './walker.js';
export type { FileEntry, DirEntry, TreeNode, WalkEvent, WalkOptions, WalkResult } from './walker.js';

// Extraction
export { extract, truncateChars, decodeText } from './extractor.js';
export type { ExtractedContent, ExtractResult } from './extractor.js';

// Rendering
export { renderTree, countNodes, SELECTED_OPEN, SELECTED_CLOSE } from './tree.js';
export { assemble, languageFor, fenceFor, inlineCode, formatWarning } from './document.js';
export type { AssembleInput, ContextMode } from './document.js';

// Errors
export { ContextError, InvalidRootError, OutputWriteError, ConfigError, toWarning } from './errors.js';
export type { ContextErrorCode, ContextWarning, WarningKind } from './errors.js';
