export interface Stage1Breakdown {
  markToMarket: number;
  marginCalls: number;
  redemptions: number;
}

/**
 * Daily liquidity trajectory of one agent.
 *
 * B0 is the starting buffer, B1 the buffer after the exogenous shock (stage 1), B2 after the
 * agent's own reactions (stage 2) and B3 after network feedback (stage 3). E1 and E2 are the
 * stage-1 and stage-3 losses; both are non-negative.
 */
export interface LiquidityPosition {
  b0: number;
  b1: number;
  b2: number;
  b3: number;
  e1: number;
  e2: number;
  stage1: Stage1Breakdown;
}

export const emptyLiquidityPosition = (): LiquidityPosition => ({
  b0: 0,
  b1: 0,
  b2: 0,
  b3: 0,
  e1: 0,
  e2: 0,
  stage1: { markToMarket: 0, marginCalls: 0, redemptions: 0 },
});
