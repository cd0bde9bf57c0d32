import { type EconomicsResult } from "../economicsEngine";

export type ChartCase = "high" | "low";

export interface CashFlowChartPoint {
  year: number;
  highCashFlow: number;
  lowCashFlow: number;
  highCumulative: number;
  lowCumulative: number;
}

export interface BreakevenMarker {
  case: ChartCase;
  year: number;
  cumulative: number;
  label: string;
}

export interface CashFlowChart {
  points: readonly CashFlowChartPoint[];
  /** Only cases that break even within the horizon get a marker. */
  breakevenMarkers: readonly BreakevenMarker[];
}

const markerFor = (
  chartCase: ChartCase,
  breakevenYear: number | null,
  cumulative: readonly number[],
): BreakevenMarker[] =>
  breakevenYear === null
    ? []
    : [
        {
          case: chartCase,
          year: breakevenYear,
          cumulative: cumulative[breakevenYear],
          label: `Break-even (Year ${breakevenYear})`,
        },
      ];

export const buildCashFlowChart = (economics: Pick<EconomicsResult, "high" | "low">): CashFlowChart => {
  const { high, low } = economics;
  const points = high.cumulativeCashFlow.map((highCumulative, year) => ({
    year,
    highCashFlow: high.cashFlow[year],
    lowCashFlow: low.cashFlow[year],
    highCumulative,
    lowCumulative: low.cumulativeCashFlow[year],
  }));

  return {
    points,
    breakevenMarkers: [
      ...markerFor("high", high.breakevenYear, high.cumulativeCashFlow),
      ...markerFor("low", low.breakevenYear, low.cumulativeCashFlow),
    ],
  };
};
