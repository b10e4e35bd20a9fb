import { ActionName, AssetClass, HoldingKey, InstrumentClass } from './enums';

export interface ActionMetadata {
  action: ActionName;
  label: string;
  instrument: InstrumentClass;
  assetClass?: AssetClass;
  // Executed amount is taken out of the source holding once the day closes.
  depletesSource: boolean;
  defaultSource?: HoldingKey;
}

export const ACTION_META: Record<ActionName, ActionMetadata> = {
  [ActionName.CentralBankFacility]: {
    action: ActionName.CentralBankFacility,
    label: 'Central bank facility',
    instrument: InstrumentClass.CentralBank,
    // Drawn amounts encumber the pledged collateral.
    depletesSource: true,
    defaultSource: HoldingKey.BoeEligibleCollateral,
  },
  [ActionName.ReduceRepoLending]: {
    action: ActionName.ReduceRepoLending,
    label: 'Reduce repo lending',
    instrument: InstrumentClass.Repo,
    depletesSource: true,
    defaultSource: HoldingKey.RepoLending,
  },
  [ActionName.SellGilts]: {
    action: ActionName.SellGilts,
    label: 'Sell gilts',
    instrument: InstrumentClass.AssetSale,
    assetClass: AssetClass.Gilt,
    depletesSource: true,
    defaultSource: HoldingKey.Gilts,
  },
  [ActionName.SellIndexLinkedGilts]: {
    action: ActionName.SellIndexLinkedGilts,
    label: 'Sell index-linked gilts',
    instrument: InstrumentClass.AssetSale,
    assetClass: AssetClass.Gilt,
    depletesSource: true,
    defaultSource: HoldingKey.IndexLinkedGilts,
  },
  [ActionName.SellCorporateBonds]: {
    action: ActionName.SellCorporateBonds,
    label: 'Sell corporate bonds',
    instrument: InstrumentClass.AssetSale,
    assetClass: AssetClass.Corporate,
    depletesSource: true,
    defaultSource: HoldingKey.CorporateBonds,
  },
  [ActionName.SellEquities]: {
    action: ActionName.SellEquities,
    label: 'Sell equities',
    instrument: InstrumentClass.AssetSale,
    assetClass: AssetClass.Equity,
    depletesSource: true,
    defaultSource: HoldingKey.Equities,
  },
  [ActionName.UnwindBasisTrades]: {
    action: ActionName.UnwindBasisTrades,
    label: 'Unwind gilt basis trades',
    instrument: InstrumentClass.AssetSale,
    assetClass: AssetClass.Gilt,
    depletesSource: true,
    defaultSource: HoldingKey.BasisTrades,
  },
  [ActionName.SeekRepo]: {
    action: ActionName.SeekRepo,
    label: 'Seek repo funding',
    instrument: InstrumentClass.Repo,
    depletesSource: false,
  },
  [ActionName.DrawRepoLines]: {
    action: ActionName.DrawRepoLines,
    label: 'Draw committed repo lines',
    instrument: InstrumentClass.Repo,
    depletesSource: true,
    defaultSource: HoldingKey.CommittedRepoLines,
  },
  [ActionName.DrawRevolvingCredit]: {
    action: ActionName.DrawRevolvingCredit,
    label: 'Draw revolving credit facility',
    instrument: InstrumentClass.Facility,
    depletesSource: true,
    defaultSource: HoldingKey.RevolvingCreditFacility,
  },
  [ActionName.PostCollateral]: {
    action: ActionName.PostCollateral,
    label: 'Post unencumbered collateral',
    instrument: InstrumentClass.Facility,
    depletesSource: true,
    defaultSource: HoldingKey.UnencumberedCollateral,
  },
  [ActionName.Recapitalisation]: {
    action: ActionName.Recapitalisation,
    label: 'Sponsor recapitalisation',
    instrument: InstrumentClass.Facility,
    depletesSource: false,
  },
  [ActionName.RedeemFunds]: {
    action: ActionName.RedeemFunds,
    label: 'Redeem fund holdings',
    instrument: InstrumentClass.Redemption,
    depletesSource: false,
  },
  [ActionName.UseCashBuffer]: {
    action: ActionName.UseCashBuffer,
    label: 'Draw cash buffer',
    instrument: InstrumentClass.Facility,
    depletesSource: true,
    defaultSource: HoldingKey.Cash,
  },
  [ActionName.SwingPricing]: {
    action: ActionName.SwingPricing,
    label: 'Swing pricing / gate',
    instrument: InstrumentClass.Throttle,
    depletesSource: false,
  },
};
