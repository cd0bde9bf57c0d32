export const APPRAISAL_YEARS = 10;
export const IRR_BISECTION_STEPS = 60;

export interface CashFlowSeries {
  /** Year 0 is the negative capex, years 1..n the constant savings. */
  cashFlows: number[];
  cumulativeCashFlow: number[];
}

const validateNonNegative = (value: number, name: string): void => {
  if (!(value >= 0)) {
    throw new Error(`${name} must be >= 0`);
  }
};

const validateYears = (years: number): void => {
  if (years < 1 || !Number.isInteger(years)) {
    throw new Error("years must be a positive integer");
  }
};

export const NPV = (discountRate: number, cashFlows: readonly number[]): number => {
  if (discountRate <= -1) {
    throw new Error("discountRate must be greater than -1");
  }
  return cashFlows.reduce(
    (acc, cashFlow, periodIndex) => acc + cashFlow / (1 + discountRate) ** periodIndex,
    0,
  );
};

export const simplePayback = (capex: number, annualSavings: number): number =>
  annualSavings > 0 ? capex / annualSavings : Number.POSITIVE_INFINITY;

/**
 * IRR in percent for an upfront capex followed by constant annual savings,
 * found by bisection on [0, 1]. The search never leaves that interval, so
 * projects that do not pay back within the horizon settle near 0%.
 */
export const irrFromSavings = (
  capex: number,
  annualSavings: number,
  years = APPRAISAL_YEARS,
  steps = IRR_BISECTION_STEPS,
): number => {
  validateYears(years);
  if (annualSavings <= 0) {
    return 0;
  }

  const flows = cashFlowSeries(capex, annualSavings, years).cashFlows;
  let low = 0;
  let high = 1;
  for (let i = 0; i < steps; i += 1) {
    const mid = (low + high) / 2;
    if (NPV(mid, flows) > 0) {
      low = mid;
    } else {
      high = mid;
    }
  }
  return ((low + high) / 2) * 100;
};

export const cashFlowSeries = (
  capex: number,
  annualSavings: number,
  years = APPRAISAL_YEARS,
): CashFlowSeries => {
  validateNonNegative(capex, "capex");
  validateYears(years);

  const rawInitial = -capex;
  const initial = Object.is(rawInitial, -0) ? 0 : rawInitial;
  const cashFlows = [initial, ...Array.from({ length: years }, () => annualSavings)];

  const cumulativeCashFlow: number[] = [];
  let running = 0;
  for (const cashFlow of cashFlows) {
    running += cashFlow;
    cumulativeCashFlow.push(running);
  }
  return { cashFlows, cumulativeCashFlow };
};

/** First year whose cumulative position is non-negative, or null within the horizon. */
export const breakevenYear = (cumulativeCashFlow: readonly number[]): number | null => {
  const index = cumulativeCashFlow.findIndex((value) => value >= 0);
  return index === -1 ? null : index;
};

/** Average return over the horizon, as a percentage of capex. */
export const horizonRoiPct = (capex: number, cumulativeCashFlow: readonly number[]): number => {
  if (capex <= 0 || cumulativeCashFlow.length === 0) {
    return 0;
  }
  const finalPosition = cumulativeCashFlow[cumulativeCashFlow.length - 1];
  return ((finalPosition + capex) / capex) * 100;
};
