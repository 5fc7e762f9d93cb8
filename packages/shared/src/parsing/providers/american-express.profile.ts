/**
 * American Express statement profile
 *
 * Amex prints "Closing Date" and "Account Ending 7-71006" style identifiers;
 * the leading digit group before the dash is dropped by the card pattern.
 */

import { AMOUNT_VALUE, DATE_VALUE, direct, labelled } from '../patterns';
import type { ProviderProfile } from '../types';

export const AMERICAN_EXPRESS_PROFILE: ProviderProfile = {
  id: 'american_express',
  displayName: 'Amex',
  fields: {
    statement_end_date: {
      patterns: [
        labelled(String.raw`Closing\s*Date`, DATE_VALUE),
        labelled(String.raw`Statement\s+(?:End|Closing)\s+Date`, DATE_VALUE),
      ],
      keywords: ['closing date', 'statement closing', 'statement end'],
      tableKeys: ['Closing Date', 'Statement Closing Date'],
    },
    payment_due_date: {
      patterns: [
        labelled(String.raw`Payment\s*Due\s*Date`, DATE_VALUE),
        labelled(String.raw`Please\s+Pay\s+By`, DATE_VALUE),
      ],
      keywords: ['payment due date', 'due date', 'please pay by'],
      tableKeys: ['Payment Due Date', 'Due Date'],
    },
    total_balance: {
      patterns: [
        labelled(String.raw`Total\s*Balance`, AMOUNT_VALUE),
        labelled(String.raw`New\s*Balance`, AMOUNT_VALUE),
        labelled(String.raw`Balance\s*Due`, AMOUNT_VALUE),
      ],
      keywords: ['total balance', 'new balance', 'balance due'],
      tableKeys: ['Total Balance', 'New Balance'],
    },
    min_payment_due: {
      patterns: [labelled(String.raw`Minimum\s*Payment(?:\s*Due)?`, AMOUNT_VALUE)],
      keywords: ['minimum payment due', 'minimum payment', 'minimum due'],
      tableKeys: ['Minimum Payment Due', 'Minimum Payment'],
    },
    card_last_4_digits: {
      patterns: [
        direct(String.raw`Account\s*Ending(?:\s*in)?[\s:-]*(?:\d-)?(\d{4,5})\b`),
        direct(String.raw`Card\s*(?:Number|Ending)(?:\s*in)?[\s:#-]*(?:[*xX.\d]{4}[\s-]?){0,3}(\d{4})\b`),
      ],
      keywords: ['account ending', 'card ending', 'card number'],
      tableKeys: ['Account Ending', 'Account Number'],
    },
  },
};
