import {
  escapeHtml,
  formatDateShort,
  formatDepositNotification,
  formatMerchantSummary,
  formatPaymentDetails,
  formatPaymentList,
  show,
  statusLabel,
  toText,
} from '../../src';

describe('Presentation', () => {
  describe('escapeHtml', () => {
    it('should escape HTML special characters', () => {
      expect(escapeHtml(`<b>"Tom" & 'Jerry'</b>`)).toBe(
        '&lt;b&gt;&quot;Tom&quot; &amp; &#x27;Jerry&#x27;&lt;/b&gt;',
      );
    });
  });

  describe('toText and show', () => {
    it('should serialize structured values as JSON', () => {
      expect(toText({ detail: 'x' })).toBe('{"detail":"x"}');
      expect(toText(12)).toBe('12');
      expect(toText(undefined)).toBe('');
    });

    it('should use the placeholder for absent values only', () => {
      expect(show(null)).toBe('—');
      expect(show(undefined, 'n/a')).toBe('n/a');
      expect(show(0)).toBe('0');
      expect(show('<x>')).toBe('&lt;x&gt;');
    });
  });

  describe('statusLabel', () => {
    it('should map known statuses case-insensitively', () => {
      expect(statusLabel('pending')).toBe('Awaiting payment');
      expect(statusLabel('PAID')).toBe('Paid');
    });

    it('should show unknown statuses lower-cased', () => {
      expect(statusLabel('Refunded')).toBe('refunded');
      expect(statusLabel('constructor')).toBe('constructor');
    });

    it('should label a missing status as Unknown', () => {
      expect(statusLabel(undefined)).toBe('Unknown');
      expect(statusLabel('')).toBe('Unknown');
    });
  });

  describe('formatDateShort', () => {
    it('should keep the wall-clock time of the timestamp', () => {
      expect(formatDateShort('2024-03-07T09:05:33.120+03:00')).toBe('07.03 09:05');
      expect(formatDateShort('2024-12-31 23:59:00')).toBe('31.12 23:59');
    });

    it('should default the time of a bare date to midnight', () => {
      expect(formatDateShort('2024-03-07')).toBe('07.03 00:00');
    });

    it('should return unparseable values unchanged', () => {
      expect(formatDateShort('yesterday')).toBe('yesterday');
      expect(formatDateShort(undefined)).toBe('—');
    });
  });

  describe('formatMerchantSummary', () => {
    it('should render balance with four decimals and the payment counters', () => {
      expect(
        formatMerchantSummary({ balance: '12.5', paid_payments_today: 3, paid_payments_total: 40 }),
      ).toBe(
        '💵 Balance: <b>12.5000 USDT</b>\n\n' +
          '📅 Paid payments today: <b>3</b>\n' +
          '✅ Paid payments in total: <b>40</b>',
      );
    });

    it('should fall back to placeholders for missing fields', () => {
      expect(formatMerchantSummary('unexpected')).toBe(
        '💵 Balance: <b>0.0000 USDT</b>\n\n' +
          '📅 Paid payments today: <b>Available later.</b>\n' +
          '✅ Paid payments in total: <b>Available later.</b>',
      );
    });
  });

  describe('formatPaymentList', () => {
    it('should return undefined when nothing is listed', () => {
      expect(formatPaymentList({ count: 0, payments: [] })).toBeUndefined();
      expect(formatPaymentList({ count: 0 })).toBeUndefined();
      expect(formatPaymentList([])).toBeUndefined();
    });

    it('should render one block per payment under a header', () => {
      const text = formatPaymentList({
        count: 1,
        payments: [
          {
            id: 'pay-1',
            status: 'pending',
            tron_address: 'TAddr',
            created_at: '2024-03-07T09:05:00',
            expires_at: '2024-03-07T10:05:00',
            amount: '10',
            amount_to_pay: '10',
            amount_paid: '0',
          },
        ],
      });

      expect(text).toBe(
        'Latest 1 payments (closed excluded):\n\n' +
          '<i>ID</i>: <code>pay-1</code>\n' +
          '<i>Status</i>: <b>Awaiting payment</b>\n' +
          '<i>Address</i>: <code>TAddr</code>\n' +
          '<i>Created</i>: <b>07.03 09:05</b>  •  Until: <b>07.03 10:05</b>\n' +
          'Amount: <b>10</b>  •  <i>To pay</i>: <b>10</b>  •  <i>Paid</i>: <b>0</b>',
      );
    });
  });

  describe('formatPaymentDetails', () => {
    it('should collapse closed payments', () => {
      expect(formatPaymentDetails({ id: 'pay-1', status: 'closed' })).toBe(
        'Payment is <b>closed</b>',
      );
    });

    it('should list present amounts, metadata and deposits', () => {
      const text = formatPaymentDetails({
        id: 'pay-2',
        status: 'paid',
        tron_address: 'TAddr',
        created_at: '2024-03-07T09:05:00',
        expires_at: '2024-03-07T10:05:00',
        amount: '10',
        metadata: { order: 'A<1>' },
        deposits: [{ id: 7, created_at: '2024-03-07T09:30:00', amount: '10', txid: 'abc' }],
      });

      expect(text).toBe(
        [
          '<b>Payment</b>',
          '<i>ID</i>: <code>pay-2</code>',
          '<i>Status</i>: <b>Paid</b>',
          '<i>Address</i>: <code>TAddr</code>',
          '⏱️ <i>Created</i>: <b>07.03 09:05</b>',
          '⌛️ <i>Expires</i>: <b>07.03 10:05</b>',
          '<i>Amount</i>: <b>10</b>',
          '<i>Metadata</i>: <code>order=A&lt;1&gt;</code>',
          '',
          '📥 <b>Deposits (1)</b>',
          '• <i>ID</i>: <code>7</code>  •  ⏱️: <b>07.03 09:30</b>\n' +
            '  💵: <b>10 USDT</b>\n' +
            '  <i>TXID</i>: <code>abc</code>',
        ].join('\n'),
      );
    });

    it('should show a dash when there are no deposits', () => {
      const text = formatPaymentDetails({ id: 'pay-3', status: 'pending' });

      expect(text.endsWith('📥 <b>Deposits (0)</b>\n—')).toBe(true);
      expect(text).toContain('<i>Metadata</i>: <code>—</code>');
    });
  });

  describe('formatDepositNotification', () => {
    it('should render address, amount and status label', () => {
      expect(
        formatDepositNotification({
          address: 'TAddr',
          amount: 25.5,
          newStatus: 'underpaid',
          merchantCredential: 'token-alpha',
        }),
      ).toBe(
        '💸 New deposit.\n\n' +
          'Address: <code><b>TAddr</b></code>\n' +
          'Amount: <b><i>25.5</i></b>\n\n' +
          'Payment status: Underpaid',
      );
    });
  });
});
