/**
 * Citi statement profile
 */

import { AMOUNT_VALUE, DATE_VALUE, direct, labelled } from '../patterns';
import type { ProviderProfile } from '../types';

export const CITI_PROFILE: ProviderProfile = {
  id: 'citi',
  displayName: 'Citi',
  fields: {
    statement_end_date: {
      patterns: [
        labelled(String.raw`Statement\s+Date`, DATE_VALUE),
        labelled(String.raw`Closing\s+Date`, DATE_VALUE),
        labelled(String.raw`Statement\s+(?:End|Close)`, DATE_VALUE),
        direct(String.raw`Billing\s+Period[:\s]+[^\n]*?\s(?:through|to|-)\s+` + DATE_VALUE),
      ],
      keywords: ['statement date', 'closing date', 'statement end'],
      tableKeys: ['Statement Date', 'Closing Date'],
    },
    payment_due_date: {
      patterns: [
        labelled(String.raw`Payment\s+Due\s+Date`, DATE_VALUE),
        labelled(String.raw`Due\s+Date`, DATE_VALUE),
      ],
      keywords: ['payment due date', 'due date'],
      tableKeys: ['Payment Due Date', 'Due Date'],
    },
    total_balance: {
      patterns: [
        labelled(String.raw`Total\s+Amount\s+Due`, AMOUNT_VALUE),
        labelled(String.raw`New\s+Balance`, AMOUNT_VALUE),
        labelled(String.raw`Balance\s+Due`, AMOUNT_VALUE),
      ],
      keywords: ['total amount due', 'new balance', 'balance due'],
      tableKeys: ['Total Amount Due', 'New Balance'],
    },
    min_payment_due: {
      patterns: [
        labelled(String.raw`Minimum\s+Payment(?:\s+Due)?`, AMOUNT_VALUE),
        labelled(String.raw`Min\s+Pay(?:ment)?`, AMOUNT_VALUE),
      ],
      keywords: ['minimum payment', 'min payment'],
      tableKeys: ['Minimum Payment', 'Minimum Payment Due'],
    },
    card_last_4_digits: {
      patterns: [
        direct(String.raw`Account\s+(?:Number|#)[:\s]+(?:[*xX.\d]{4}[\s-]?){0,3}(\d{4})\b`),
        direct(String.raw`Card\s+Ending(?:\s+in)?[\s:-]*(\d{4})\b`),
        direct(String.raw`Account\s+Ending(?:\s+in)?[\s:-]*(\d{4})\b`),
      ],
      keywords: ['account number', 'account ending', 'card ending'],
      tableKeys: ['Account Number'],
    },
  },
};
