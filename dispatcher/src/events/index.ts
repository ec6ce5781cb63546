export {
  CompletionListener,
  type CompletionMessage,
  type CompletionSubscriber,
  type OutcomeSink,
} from './completion-listener.js';

export {
  outcomeFromBuildEvent,
  type BuildEventMapping,
  type RunnerLookup,
} from './gitlab.js';

export { outcomeSchema, gitlabBuildEventSchema, type GitLabBuildEvent } from './schemas.js';
