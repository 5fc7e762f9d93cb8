/**
 * Chase statement profile
 *
 * Chase states the cycle as a range ("Statement Period: 11/21/2025 through
 * 12/20/2025" or "Opening/Closing Date 11/21/25 - 12/20/25"); the closing
 * date is the second date of the range.
 */

import { AMOUNT_VALUE, DATE_VALUE, direct, labelled } from '../patterns';
import type { ProviderProfile } from '../types';

export const CHASE_PROFILE: ProviderProfile = {
  id: 'chase',
  displayName: 'Chase',
  fields: {
    statement_end_date: {
      patterns: [
        direct(String.raw`Statement\s+Period[:\s]+[^\n]*?\s(?:through|to|-)\s+` + DATE_VALUE),
        direct(String.raw`Opening/Closing\s+Date[:\s]+[^\n]*?\s?-\s*` + DATE_VALUE),
        labelled(String.raw`Closing\s+Date`, DATE_VALUE),
      ],
      keywords: ['closing date', 'statement date', 'statement end'],
      tableKeys: ['Statement Closing', 'Closing Date', 'Statement Date'],
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
        labelled(String.raw`New\s+Balance`, AMOUNT_VALUE),
        labelled(String.raw`Total\s+Balance`, AMOUNT_VALUE),
      ],
      keywords: ['new balance', 'total balance'],
      tableKeys: ['New Balance', 'Total Balance'],
    },
    min_payment_due: {
      patterns: [
        labelled(String.raw`Minimum\s+Payment\s+Due`, AMOUNT_VALUE),
        labelled(String.raw`Minimum\s+Payment`, AMOUNT_VALUE),
      ],
      keywords: ['minimum payment due', 'minimum payment'],
      tableKeys: ['Minimum Payment Due', 'Minimum Payment'],
    },
    card_last_4_digits: {
      patterns: [
        direct(String.raw`Account\s+Number[:\s]+((?:[*xX.\d]{4}[\s-]?){0,3}\d{4})\b`),
        direct(String.raw`Account\s+Ending(?:\s+in)?[\s:-]*(\d{4})\b`),
      ],
      keywords: ['account number', 'account ending', 'card ending'],
      tableKeys: ['Account Number'],
    },
  },
};
