export { RunSession } from './run_session';
export type { RunSessionDependencies, RunSessionOptions, RunSessionOutcome } from './run_session.types';
