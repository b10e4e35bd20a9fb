/**
 * LDI / pension scheme behaviour.
 *
 * Leveraged liability hedges drive large variation margin once gilt yields move past the
 * scheme's yield buffer. Segregated mandates need trustee sign-off before the sponsor
 * recapitalises, so their recapitalisation lags by a day and then arrives over
 * `speedDays`; pooled funds recapitalise immediately.
 */
import type { LdiPensionAgent } from '../../domain/agents';
import { ActionName, HoldingKey, MarketVariable } from '../../domain/enums';
import { formatMm } from '../../utils/formatters';
import { stressIndex } from '../market';
import { holdingAmount, markToMarketLoss } from './holdings';
import { seekRepoFromBanks } from './repo';
import { holdingStep, recordStep, redeemStep } from './waterfall';
import type { AgentBehaviour, WaterfallStep } from './waterfall';

const BPS = 0.0001;
const LEVERAGE_PASS_THROUGH = 0.5;
const VARIATION_MARGIN_RATE = 0.04;
const INITIAL_MARGIN_RATE = 0.003;
const BUFFER_BREACH_MARGIN_RATE = 0.06;

/** Outstanding recapitalisation the sponsor can still provide. */
export const outstandingRecapitalisation = (scheme: LdiPensionAgent): number =>
  Math.max(0, scheme.recapitalisation.available - scheme.recapitalisation.used);

/**
 * Recapitalisation the scheme can receive on `day`. A segregated scheme that has not yet asked
 * its trustees gets nothing today; the request is lodged by `recapitalisationStep`.
 */
export const recapitalisationRoom = (scheme: LdiPensionAgent, day: number): number => {
  const recap = scheme.recapitalisation;
  const outstanding = outstandingRecapitalisation(scheme);
  if (recap.pooled) return outstanding;
  if (recap.requestedOnDay === null || day <= recap.requestedOnDay) return 0;
  return outstanding / Math.max(1, recap.speedDays);
};

const recapitalisationStep: WaterfallStep<LdiPensionAgent> = (scheme, ctx, ledger) => {
  if (ledger.remaining <= 0 || outstandingRecapitalisation(scheme) <= 0) return;
  const recap = scheme.recapitalisation;
  if (!recap.pooled && recap.requestedOnDay === null) {
    recap.requestedOnDay = ctx.day;
    ctx.log.emit(
      ctx.day,
      'info',
      `${scheme.name}: recapitalisation of ${formatMm(outstandingRecapitalisation(scheme))} requested from trustees`,
      scheme.id
    );
    return;
  }
  const share = ctx.config.reactions.ldiPension.recapitalisationShare;
  recordStep(
    ledger,
    ActionName.Recapitalisation,
    Math.min(ledger.remaining * share, recapitalisationRoom(scheme, ctx.day))
  );
};

const seekClearingRepo: WaterfallStep<LdiPensionAgent> = (scheme, ctx, ledger) => {
  if (ledger.remaining <= 0) return;
  seekRepoFromBanks(scheme, ledger.remaining * ctx.config.reactions.ldiPension.repoAskPct, ctx, ledger);
};

const ldiWaterfall: readonly WaterfallStep<LdiPensionAgent>[] = [
  holdingStep(ActionName.PostCollateral, HoldingKey.UnencumberedCollateral, (c) => c.reactions.ldiPension.postCollateral),
  recapitalisationStep,
  holdingStep(ActionName.SellGilts, HoldingKey.Gilts, (c) => c.reactions.ldiPension.sellGilts),
  holdingStep(ActionName.SellIndexLinkedGilts, HoldingKey.IndexLinkedGilts, (c) => c.reactions.ldiPension.sellIndexLinkedGilts),
  holdingStep(ActionName.SellCorporateBonds, HoldingKey.CorporateBonds, (c) => c.reactions.ldiPension.sellCorporateBonds),
  seekClearingRepo,
  redeemStep((c) => c.reactions.ldiPension.redeemFunds),
];

export const ldiPensionBehaviour: AgentBehaviour<LdiPensionAgent> = {
  markToMarket: (scheme, ctx) =>
    markToMarketLoss(scheme.balanceSheet.items, ctx.market.deltas) * scheme.leverageRatio * LEVERAGE_PASS_THROUGH,
  marginCalls: (scheme, ctx) => {
    const levels = ctx.market.levels;
    const derivatives = holdingAmount(scheme, HoldingKey.DerivativesExposure);
    const move10y = Math.abs(levels[MarketVariable.Gilt10y]);
    const largestMove = Math.max(move10y, Math.abs(levels[MarketVariable.Gilt30y]));
    const stress = stressIndex(levels, ctx.config.market);

    let variation = derivatives * largestMove * BPS * VARIATION_MARGIN_RATE;
    const initial = derivatives * Math.max(0, stress - 1) * INITIAL_MARGIN_RATE;

    scheme.yieldBufferConsumed = scheme.yieldBufferBps > 0 ? Math.min(1, move10y / scheme.yieldBufferBps) : 1;
    if (scheme.yieldBufferConsumed >= 1) {
      const excess = Math.max(0, move10y - scheme.yieldBufferBps);
      variation += derivatives * excess * BPS * BUFFER_BREACH_MARGIN_RATE;
    }
    return variation + initial;
  },
  outflows: () => 0,
  waterfall: () => ldiWaterfall,
};
