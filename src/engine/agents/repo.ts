import type { Agent } from '../../domain/agents';
import { isBank } from '../../domain/agents';
import { ActionName } from '../../domain/enums';
import { formatMm } from '../../utils/formatters';
import { assessRepoRequest } from './bank';
import { recordStep } from './waterfall';
import type { ReactionContext, WaterfallLedger } from './waterfall';

export interface RepoOutcome {
  requested: number;
  obtained: number;
  lenders: string[];
  refusedByAll: boolean;
}

/**
 * Splits a repo ask equally across the requester's connected banks and records whatever they
 * grant as one `seek_repo` action. An agent with no connected bank gets nothing from this channel.
 */
export const seekRepoFromBanks = (
  agent: Agent,
  ask: number,
  ctx: ReactionContext,
  ledger: WaterfallLedger
): RepoOutcome => {
  const bankIds = ctx.network.banksOf(agent.id);
  if (ask <= 0 || bankIds.length === 0) {
    return { requested: ask, obtained: 0, lenders: [], refusedByAll: ask > 0 };
  }
  const perBank = ask / bankIds.length;
  let obtained = 0;
  const lenders: string[] = [];
  bankIds.forEach((bankId) => {
    const bank = ctx.agentsById.get(bankId);
    if (!bank || !isBank(bank)) return;
    const granted = assessRepoRequest(bank, agent.id, perBank, ctx.network, ctx.config.bank);
    if (granted > 0) {
      obtained += granted;
      lenders.push(bankId);
    }
  });

  if (obtained > 0) {
    recordStep(ledger, ActionName.SeekRepo, obtained, undefined, lenders);
  } else {
    ctx.log.emit(
      ctx.day,
      'warning',
      `${agent.name}: repo request of ${formatMm(ask)} refused by all ${bankIds.length} connected bank(s)`,
      agent.id
    );
  }
  return { requested: ask, obtained, lenders, refusedByAll: obtained <= 0 };
};
