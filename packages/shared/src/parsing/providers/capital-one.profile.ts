/**
 * Capital One statement profile
 *
 * Capital One summary boxes print the amount above its caption
 * ("$812.40" then "New Balance"), so balance proximity searches backward.
 */

import { AMOUNT_VALUE, DATE_VALUE, direct, labelled } from '../patterns';
import type { ProviderProfile } from '../types';

export const CAPITAL_ONE_PROFILE: ProviderProfile = {
  id: 'capital_one',
  displayName: 'Capital One',
  fields: {
    statement_end_date: {
      patterns: [
        direct(String.raw`(?:Billing\s+Cycle|Statement\s+Period)[:\s]+[^\n]*?\s(?:through|to|-)\s+` + DATE_VALUE),
        labelled(String.raw`Closing\s+Date`, DATE_VALUE),
        labelled(String.raw`Statement\s+Date`, DATE_VALUE),
      ],
      keywords: ['closing date', 'statement date'],
      tableKeys: ['Closing Date', 'Statement Date', 'Billing Cycle End'],
    },
    payment_due_date: {
      patterns: [
        labelled(String.raw`Payment\s+Due\s+Date`, DATE_VALUE),
        labelled(String.raw`Due\s+Date`, DATE_VALUE),
        labelled(String.raw`Pay\s+By`, DATE_VALUE),
      ],
      keywords: ['payment due date', 'due date', 'pay by'],
      tableKeys: ['Payment Due Date', 'Due Date'],
    },
    total_balance: {
      patterns: [
        labelled(String.raw`New\s+Balance`, AMOUNT_VALUE),
        labelled(String.raw`Total\s+Balance`, AMOUNT_VALUE),
        labelled(String.raw`Balance\s+Due`, AMOUNT_VALUE),
      ],
      keywords: ['new balance', 'total balance'],
      tableKeys: ['New Balance', 'Total Balance'],
      proximityDirection: 'backward',
    },
    min_payment_due: {
      patterns: [labelled(String.raw`Minimum\s+Payment(?:\s+Due)?`, AMOUNT_VALUE)],
      keywords: ['minimum payment due', 'minimum payment'],
      tableKeys: ['Minimum Payment Due', 'Minimum Payment'],
    },
    card_last_4_digits: {
      patterns: [
        direct(String.raw`Account\s+ending\s+in[\s:]*(\d{4})\b`),
        direct(String.raw`Card\s+ending\s+in[\s:]*(\d{4})\b`),
      ],
      keywords: ['ending in', 'account ending', 'card ending'],
      tableKeys: ['Account Number', 'Account Ending'],
    },
  },
};
