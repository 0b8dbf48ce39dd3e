import type { HookPhase } from '../errors';
import type { Logger } from '../logger';

/**
 * Why a history entry was written
 */
export type HistoryCause = 'start' | 'advance' | 'prune';

/**
 * One line of a state's audit trail
 */
export type HistoryEntry = Readonly<{
  /** Flow node id */
  node: string;
  /** Label of the rule the node instantiates */
  rule: string;
  event: HookPhase;
  at: Date;
  cause: HistoryCause;
}>;

export type StateStatus = 'active' | 'complete';

/**
 * Options accepted by {@link startState} and {@link restoreState}
 */
export type StateOptions = {
  /** Defaults to a random UUID */
  id?: string;
  /**
   * When `false`, nodes already visited or pruned in this state are no longer
   * offered by `allowedNextNodes` and cannot be advanced into.
   * @default true
   */
  allowRepeats?: boolean;
  /** Timestamp source for history entries */
  clock?: () => Date;
  logger?: Logger;
};

export type AdvanceOptions = {
  /**
   * For fork positions: retire the position after this activation even if
   * some of its children were never activated.
   */
  closeFork?: boolean;
};
