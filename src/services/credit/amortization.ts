import { Money } from "../../utils/money.util";
import { addMonths } from "../../utils/date.util";

export interface ScheduledPayment {
  paymentNumber: number;
  dueDate: Date;
  paymentAmount: bigint;
  principalAmount: bigint;
  interestAmount: bigint;
  /** principal left after this payment */
  remainingBalance: bigint;
}

export interface ScheduleInput {
  /** kopecks */
  principal: bigint;
  annualRatePercent: number;
  termMonths: number;
  /** kopecks */
  monthlyPayment: bigint;
  startDate: Date;
}

const monthlyRate = (annualRatePercent: number): number => annualRatePercent / 100 / 12;

/**
 * Fixed annuity payment in roubles, rounded to kopecks half away from zero.
 * Returns 0 for a non-positive principal or term or a negative rate; any
 * positive principal pays at least one kopeck.
 */
export function computeMonthlyPayment(
  principal: number,
  annualRatePercent: number,
  termMonths: number
): number {
  if (!(principal > 0) || !(annualRatePercent >= 0) || !(termMonths > 0)) {
    return 0;
  }

  const r = monthlyRate(annualRatePercent);
  let payment: number;
  if (r === 0) {
    payment = principal / termMonths;
  } else {
    const growth = Math.pow(1 + r, termMonths);
    payment = (principal * r * growth) / (growth - 1);
  }

  return Math.max(Money.round2(payment), 0.01);
}

function splitMinor(
  paymentNumber: number,
  termMonths: number,
  payment: bigint,
  annualRatePercent: number,
  remaining: bigint
): { principal: bigint; interest: bigint } {
  if (paymentNumber >= termMonths) {
    return { principal: remaining, interest: payment - remaining };
  }

  const interest = Money.roundToMinor(Money.toNumber(remaining) * monthlyRate(annualRatePercent));
  const principal = Money.min(Money.max(payment - interest, 0n), remaining);
  return { principal, interest };
}

/**
 * Splits one payment into principal and interest. The final payment retires
 * whatever principal is left; interest absorbs the rounding difference.
 */
export function splitPayment(
  paymentNumber: number,
  termMonths: number,
  monthlyPayment: number,
  interestRatePercent: number,
  remainingPrincipal: number
): { principal: number; interest: number } {
  const { principal, interest } = splitMinor(
    paymentNumber,
    termMonths,
    Money.roundToMinor(monthlyPayment),
    interestRatePercent,
    Money.roundToMinor(remainingPrincipal)
  );
  return { principal: Money.toNumber(principal), interest: Money.toNumber(interest) };
}

/**
 * One row per payment number, due on the same day of month as startDate.
 * Principal portions add up to the principal to the kopeck.
 */
export function buildPaymentSchedule(input: ScheduleInput): ScheduledPayment[] {
  const { principal, annualRatePercent, termMonths, monthlyPayment, startDate } = input;
  const schedule: ScheduledPayment[] = [];
  let remaining = principal;

  for (let n = 1; n <= termMonths; n++) {
    const split = splitMinor(n, termMonths, monthlyPayment, annualRatePercent, remaining);
    remaining -= split.principal;

    schedule.push({
      paymentNumber: n,
      dueDate: addMonths(startDate, n),
      paymentAmount: monthlyPayment,
      principalAmount: split.principal,
      interestAmount: split.interest,
      remainingBalance: remaining,
    });
  }

  return schedule;
}

export function totalCost(monthlyPayment: bigint, termMonths: number): bigint {
  return monthlyPayment * BigInt(termMonths);
}

export function totalInterest(
  principal: bigint,
  monthlyPayment: bigint,
  termMonths: number
): bigint {
  return totalCost(monthlyPayment, termMonths) - principal;
}
