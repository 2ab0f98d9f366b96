export const LEDGER_STATEMENT_TEXT = [
  "First Community Bank",
  "Statement Period: 01/01/2024 - 01/31/2024",
  "Beginning Balance $0.00",
  "01/02/2024 CARD SETTLEMENT STRIPE 4,000.00 4,000.00",
  "01/05/2024 CUSTOMER DEPOSIT 1,500.00 5,500.00",
  "01/08/2024 ACH DEBIT LENDERCO ID 8812 500.00 5,000.00",
  "01/10/2024 COMCAST BUSINESS 200.00 4,800.00",
  "01/15/2024 ACH DEBIT LENDERCO ID 8812 500.00 4,300.00",
  "01/18/2024 SYSCO FOODS 1,300.00 3,000.00",
  "01/22/2024 ACH DEBIT LENDERCO ID 8812 500.00 2,500.00",
  "01/25/2024 WIRE TRANSFER TO SAVINGS 1,000.00 1,500.00",
  "01/29/2024 RENT JANUARY 1,000.00 500.00",
  "Ending Balance $500.00",
].join("\n");

export const FIXED_NOW = new Date(Date.UTC(2026, 0, 1));
