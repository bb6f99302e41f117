import { PaymentStatus } from '../domain/enums';
import { NotificationEvent, isRecord } from '../domain/models';
import { escapeHtml, show, toText } from './html';

const STATUS_LABELS: Record<PaymentStatus, string> = {
  [PaymentStatus.PENDING]: 'Awaiting payment',
  [PaymentStatus.PAID]: 'Paid',
  [PaymentStatus.UNDERPAID]: 'Underpaid',
  [PaymentStatus.EXPIRED]: 'Expired',
  [PaymentStatus.CLOSED]: 'Closed',
  [PaymentStatus.ERROR]: 'Error',
};

const AVAILABLE_LATER = 'Available later.';

const ISO_DATE_TIME = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2}))?/;

const PAYMENT_STATUSES: ReadonlySet<string> = new Set(Object.values(PaymentStatus));

function isPaymentStatus(value: string): value is PaymentStatus {
  return PAYMENT_STATUSES.has(value);
}

/**
 * Human label for a payment status; unknown statuses are shown lower-cased
 */
export function statusLabel(status: unknown): string {
  if (!status) {
    return 'Unknown';
  }
  const value = toText(status).toLowerCase();
  return isPaymentStatus(value) ? STATUS_LABELS[value] : value;
}

/**
 * "DD.MM HH:mm" using the wall-clock time written in the timestamp
 */
export function formatDateShort(value: unknown): string {
  if (!value) {
    return '—';
  }
  if (typeof value !== 'string') {
    return toText(value);
  }

  const match = ISO_DATE_TIME.exec(value);
  if (!match) {
    return value;
  }

  const [, , month, day, hours = '00', minutes = '00'] = match;
  return `${day}.${month} ${hours}:${minutes}`;
}

export function formatMerchantSummary(info: unknown): string {
  const data = isRecord(info) ? info : {};

  const balance = Number(data.balance ?? '0');
  const balanceText = Number.isFinite(balance)
    ? balance.toFixed(4)
    : show(data.balance);

  return (
    `💵 Balance: <b>${balanceText} USDT</b>\n\n` +
    `📅 Paid payments today: <b>${show(data.paid_payments_today, AVAILABLE_LATER)}</b>\n` +
    `✅ Paid payments in total: <b>${show(data.paid_payments_total, AVAILABLE_LATER)}</b>`
  );
}

export function formatPaymentBlock(payment: Record<string, unknown>): string {
  const created = escapeHtml(formatDateShort(payment.created_at));
  const expires = escapeHtml(formatDateShort(payment.expires_at));

  return [
    `<i>ID</i>: <code>${show(payment.id)}</code>`,
    `<i>Status</i>: <b>${escapeHtml(statusLabel(payment.status))}</b>`,
    `<i>Address</i>: <code>${show(payment.tron_address)}</code>`,
    `<i>Created</i>: <b>${created}</b>  •  Until: <b>${expires}</b>`,
    `Amount: <b>${show(payment.amount, '-')}</b>  •  ` +
      `<i>To pay</i>: <b>${show(payment.amount_to_pay, '-')}</b>  •  ` +
      `<i>Paid</i>: <b>${show(payment.amount_paid, '-')}</b>`,
  ].join('\n');
}

/**
 * Render a payment history response, or undefined when it lists nothing
 */
export function formatPaymentList(history: unknown): string | undefined {
  if (!isRecord(history)) {
    return undefined;
  }

  const payments = history.payments;
  if (!Array.isArray(payments) || payments.length === 0) {
    return undefined;
  }

  const blocks = payments.filter(isRecord).map(formatPaymentBlock);
  const header = `Latest ${show(history.count, '?')} payments (closed excluded):\n\n`;

  return header + (blocks.length > 0 ? blocks.join('\n\n') : 'No payments found.');
}

function formatMetadata(metadata: unknown): string {
  if (metadata === undefined || metadata === null) {
    return '—';
  }
  if (isRecord(metadata) && Object.keys(metadata).length > 0) {
    return Object.entries(metadata)
      .map(([key, value]) => `${key}=${toText(value)}`)
      .join(', ');
  }
  return toText(metadata);
}

function formatDeposit(deposit: Record<string, unknown>): string {
  return (
    `• <i>ID</i>: <code>${show(deposit.id)}</code>  •  ` +
    `⏱️: <b>${escapeHtml(formatDateShort(deposit.created_at))}</b>\n` +
    `  💵: <b>${show(deposit.amount)} USDT</b>\n` +
    `  <i>TXID</i>: <code>${show(deposit.txid)}</code>`
  );
}

export function formatPaymentDetails(payment: Record<string, unknown>): string {
  if (payment.status === PaymentStatus.CLOSED) {
    return 'Payment is <b>closed</b>';
  }

  const deposits = Array.isArray(payment.deposits) ? payment.deposits : [];
  const depositLines = deposits.filter(isRecord).map(formatDeposit);

  const amountFields: Array<[string, unknown]> = [
    ['Amount', payment.amount],
    ['To pay', payment.amount_to_pay],
    ['Paid', payment.amount_paid],
  ];
  const amountLines = amountFields
    .filter(([, value]) => value !== undefined && value !== null)
    .map(([label, value]) => `<i>${label}</i>: <b>${show(value)}</b>`);

  return [
    '<b>Payment</b>',
    `<i>ID</i>: <code>${show(payment.id)}</code>`,
    `<i>Status</i>: <b>${escapeHtml(statusLabel(payment.status))}</b>`,
    `<i>Address</i>: <code>${show(payment.tron_address)}</code>`,
    `⏱️ <i>Created</i>: <b>${escapeHtml(formatDateShort(payment.created_at))}</b>`,
    `⌛️ <i>Expires</i>: <b>${escapeHtml(formatDateShort(payment.expires_at))}</b>`,
    ...amountLines,
    `<i>Metadata</i>: <code>${escapeHtml(formatMetadata(payment.metadata))}</code>`,
    '',
    `📥 <b>Deposits (${deposits.length})</b>`,
    depositLines.length > 0 ? depositLines.join('\n') : '—',
  ].join('\n');
}

export function formatDepositNotification(event: NotificationEvent): string {
  return (
    '💸 New deposit.\n\n' +
    `Address: <code><b>${escapeHtml(event.address)}</b></code>\n` +
    `Amount: <b><i>${escapeHtml(String(event.amount))}</i></b>\n\n` +
    `Payment status: ${escapeHtml(statusLabel(event.newStatus))}`
  );
}
