import { randomInt } from "crypto";
import { v4 as uuidv4 } from "uuid";

export const newId = (): string => uuidv4();

/** Balance-account prefix for individuals in roubles. */
const ACCOUNT_NUMBER_PREFIX = "40817810";

/**
 * 20-digit account number: fixed prefix plus 12 random digits.
 * Example: "40817810042519873301"
 */
export const generateAccountNumber = (): string => {
  let suffix = "";
  for (let i = 0; i < 12; i++) suffix += randomInt(0, 10).toString();
  return `${ACCOUNT_NUMBER_PREFIX}${suffix}`;
};
