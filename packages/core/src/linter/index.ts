export {
  ContentLinter,
  compareDiagnostics,
  normalizeDocumentPath,
  type ContentLinterOptions,
} from './content-linter.js';
export { LintScheduler } from './lint-scheduler.js';
