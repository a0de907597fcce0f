import {
  CreditIssuedContext,
  PaymentOverdueContext,
  PaymentSettledContext,
} from "../../infra/email/templates";

export type NotificationPayloadMap = {
  credit_issued: CreditIssuedContext;
  payment_settled: PaymentSettledContext;
  payment_overdue: PaymentOverdueContext;
};

export type NotificationKind = keyof NotificationPayloadMap;

export interface NotificationRecipient {
  userId: string;
}

/** [kind, recipient, payload] with the payload tied to its kind */
export type NotificationArgs = {
  [K in NotificationKind]: [kind: K, recipient: NotificationRecipient, payload: NotificationPayloadMap[K]];
}[NotificationKind];

export interface NotificationDispatcher {
  send(...args: NotificationArgs): Promise<void>;
}
