/**
 * Bank of America statement profile
 */

import { AMOUNT_VALUE, DATE_VALUE, direct, labelled } from '../patterns';
import type { ProviderProfile } from '../types';

export const BANK_OF_AMERICA_PROFILE: ProviderProfile = {
  id: 'bank_of_america',
  displayName: 'Bank of America',
  fields: {
    statement_end_date: {
      patterns: [
        labelled(String.raw`Closing\s+Date`, DATE_VALUE),
        labelled(String.raw`Statement\s+(?:End(?:ing)?|Close)\s+Date`, DATE_VALUE),
        direct(String.raw`Statement\s+Period[:\s]+[^\n]*?\s(?:through|to|-)\s+` + DATE_VALUE),
      ],
      keywords: ['closing date', 'statement end'],
      tableKeys: ['Statement Closing', 'Closing Date', 'Statement Date'],
    },
    payment_due_date: {
      patterns: [
        labelled(String.raw`Payment\s+Due\s+Date`, DATE_VALUE),
        labelled(String.raw`Due\s+Date`, DATE_VALUE),
        labelled(String.raw`Payment\s+By`, DATE_VALUE),
      ],
      keywords: ['payment due date', 'due date', 'payment by'],
      tableKeys: ['Payment Due Date', 'Due Date'],
    },
    total_balance: {
      patterns: [
        labelled(String.raw`New\s+Balance(?:\s+Total)?`, AMOUNT_VALUE),
        labelled(String.raw`Total\s+Balance`, AMOUNT_VALUE),
        labelled(String.raw`Balance\s+Due`, AMOUNT_VALUE),
      ],
      keywords: ['new balance', 'total balance', 'balance due'],
      tableKeys: ['New Balance', 'Total Balance'],
    },
    min_payment_due: {
      patterns: [
        labelled(String.raw`Minimum\s+Payment(?:\s+Due)?`, AMOUNT_VALUE),
        labelled(String.raw`Min(?:imum)?\s+Pay(?:ment)?`, AMOUNT_VALUE),
      ],
      keywords: ['minimum payment', 'min payment'],
      tableKeys: ['Minimum Payment', 'Minimum Payment Due'],
    },
    card_last_4_digits: {
      patterns: [
        direct(String.raw`Account\s+(?:#|Number)[:\s]+(?:[*xX.\d]{4}[\s-]?){0,3}(\d{4})\b`),
        direct(String.raw`Card\s+(?:Number|Ending)[:\s-]+(?:[*xX.\d]{4}[\s-]?){0,3}(\d{4})\b`),
        direct(String.raw`Account\s+Ending[\s:-]+(\d{4})\b`),
      ],
      keywords: ['account #', 'account number', 'card ending'],
      tableKeys: ['Account Number'],
    },
  },
};
