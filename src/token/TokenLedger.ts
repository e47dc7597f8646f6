/**
 * Fungible-token balances used to settle product payments.
 * `transfer` reports failure by returning false; it never partially applies.
 */
export interface TokenLedger {
    balanceOf(principal: string): Promise<number>;
    transfer(from: string, to: string, amount: number): Promise<boolean>;
}
