const COLORS = {
  primary: "#1E70BF",
  success: "#04AA6D",
  danger: "#dc3545",
  backgroundLight: "#f9f9f9",
  textDark: "#212529",
  border: "#dee2e6",
};

const baseStyles = {
  font: `font-family: 'Inter', 'Helvetica Neue', Helvetica, Arial, sans-serif; line-height: 1.65; color: ${COLORS.textDark};`,
  container: `max-width: 600px; margin: 0 auto; background-color: #ffffff; border-radius: 12px; overflow: hidden;`,
  header: `background-color: ${COLORS.primary}; padding: 30px 20px; text-align: center; color: #ffffff; font-size: 24px; font-weight: 700;`,
  content: `padding: 30px 40px;`,
  footer: `padding: 20px 40px; border-top: 1px solid ${COLORS.border}; font-size: 13px; color: #6c757d; text-align: center; background-color: ${COLORS.backgroundLight};`,
  tableHeader: `padding: 12px; background-color: ${COLORS.backgroundLight}; width: 40%; border: 1px solid ${COLORS.border}; font-weight: 600;`,
  tableData: `padding: 12px; font-weight: bold; border: 1px solid ${COLORS.border};`,
};

const escapeHtml = (value: string | number): string =>
  String(value)
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");

const layout = (brand: string, body: string) => `
  <!DOCTYPE html>
  <html lang="en">
  <head><meta charset="UTF-8"><title>${escapeHtml(brand)}</title></head>
  <body style="margin: 0; padding: 0; background-color: #f4f4f4; ${baseStyles.font}">
    <div style="padding: 30px 0;">
      <div style="${baseStyles.container}">
        <div style="${baseStyles.header}">${escapeHtml(brand)}</div>
        <div style="${baseStyles.content}">${body}</div>
        <div style="${baseStyles.footer}">
          <p>This is an automated message. Please do not reply directly. | &copy; ${new Date().getFullYear()} ${escapeHtml(brand)}.</p>
        </div>
      </div>
    </div>
  </body>
  </html>
`;

const table = (rows: Array<[string, string | number]>) => `
  <table style="width: 100%; border-collapse: collapse; margin: 20px 0;">
    ${rows
      .map(
        ([label, value]) =>
          `<tr><td style="${baseStyles.tableHeader}">${escapeHtml(label)}</td><td style="${baseStyles.tableData}">${escapeHtml(value)}</td></tr>`
      )
      .join("\n")}
  </table>
`;

export type CreditIssuedContext = {
  creditId: string;
  amount: string;
  interestRate: number;
  termMonths: number;
  monthlyPayment: string;
  firstDueDate: string;
};

export type PaymentSettledContext = {
  creditId: string;
  paymentNumber: number;
  amountPaid: string;
  penalty: string;
  remainingDebt: string;
};

export type PaymentOverdueContext = {
  creditId: string;
  paymentNumber: number;
  dueDate: string;
  paymentAmount: string;
  penalty: string;
  totalPenalty: string;
};

export type EmailTemplateContextMap = {
  CREDIT_ISSUED: CreditIssuedContext;
  PAYMENT_SETTLED: PaymentSettledContext;
  PAYMENT_OVERDUE: PaymentOverdueContext;
};

export type EmailTemplateId = keyof EmailTemplateContextMap;

export type EmailTemplateResult = {
  subject: string;
  html: string;
  text: string;
};

type EmailTemplateFnMap = {
  [K in EmailTemplateId]: (ctx: EmailTemplateContextMap[K], brand: string) => EmailTemplateResult;
};

export const emailTemplates: EmailTemplateFnMap = {
  CREDIT_ISSUED: (ctx, brand) => ({
    subject: `[${brand}] Your credit of ${ctx.amount} RUB has been issued`,
    html: layout(
      brand,
      `<h1 style="color: ${COLORS.primary}; font-size: 24px;">Credit issued</h1>
       <p>The funds have been credited to your account.</p>
       ${table([
         ["Amount", `${ctx.amount} RUB`],
         ["Interest rate", `${ctx.interestRate}%`],
         ["Term", `${ctx.termMonths} months`],
         ["Monthly payment", `${ctx.monthlyPayment} RUB`],
         ["First payment due", ctx.firstDueDate],
       ])}`
    ),
    text: `Credit ${ctx.creditId} issued: ${ctx.amount} RUB at ${ctx.interestRate}% for ${ctx.termMonths} months. Monthly payment ${ctx.monthlyPayment} RUB, first due ${ctx.firstDueDate}.`,
  }),

  PAYMENT_SETTLED: (ctx, brand) => ({
    subject: `[${brand}] Payment #${ctx.paymentNumber} received`,
    html: layout(
      brand,
      `<h1 style="color: ${COLORS.success}; font-size: 24px;">Payment received</h1>
       ${table([
         ["Payment", `#${ctx.paymentNumber}`],
         ["Charged", `${ctx.amountPaid} RUB`],
         ["Late fee included", `${ctx.penalty} RUB`],
         ["Remaining debt", `${ctx.remainingDebt} RUB`],
       ])}`
    ),
    text: `Payment #${ctx.paymentNumber} on credit ${ctx.creditId} charged: ${ctx.amountPaid} RUB (late fee ${ctx.penalty} RUB). Remaining debt ${ctx.remainingDebt} RUB.`,
  }),

  PAYMENT_OVERDUE: (ctx, brand) => ({
    subject: `[${brand}] Payment #${ctx.paymentNumber} is overdue`,
    html: layout(
      brand,
      `<h1 style="color: ${COLORS.danger}; font-size: 24px;">Payment overdue</h1>
       <p>We could not collect your scheduled payment: the account balance is too low.</p>
       ${table([
         ["Payment", `#${ctx.paymentNumber}`],
         ["Due date", ctx.dueDate],
         ["Amount due", `${ctx.paymentAmount} RUB`],
         ["Late fee added", `${ctx.penalty} RUB`],
         ["Late fees so far", `${ctx.totalPenalty} RUB`],
       ])}`
    ),
    text: `Payment #${ctx.paymentNumber} on credit ${ctx.creditId} (due ${ctx.dueDate}, ${ctx.paymentAmount} RUB) is overdue. Late fee added: ${ctx.penalty} RUB, total late fees ${ctx.totalPenalty} RUB.`,
  }),
};
