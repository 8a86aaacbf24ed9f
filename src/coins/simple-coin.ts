/**
 * Coinset: Simple Coin
 *
 * Concrete Coin backed by a transaction, one of its output indexes and the
 * number of confirmations that transaction has.
 */

import { InvalidSelectionArgsError } from "../errors.js";
import type { Coin, TxLike } from "../types.js";

export class SimpleCoin implements Coin {
  readonly tx: TxLike;
  readonly output: number;
  readonly confirmations: number;

  constructor(tx: TxLike, output: number, confirmations: number) {
    const out = tx.outputs[output];
    if (!Number.isInteger(output) || out === undefined) {
      throw new InvalidSelectionArgsError(`tx ${tx.txid} has no output ${output}`);
    }
    if (!Number.isInteger(out.amount) || out.amount < 0) {
      throw new InvalidSelectionArgsError(`tx ${tx.txid} output ${output} has invalid amount ${out.amount}`);
    }
    if (!Number.isInteger(confirmations) || confirmations < 0) {
      throw new InvalidSelectionArgsError(`invalid confirmation count ${confirmations}`);
    }
    this.tx = tx;
    this.output = output;
    this.confirmations = confirmations;
  }

  amount(): number {
    return this.txOut().amount;
  }

  /**
   * Product of the amount and the number of confirmations. Used as an input
   * to the priority of a spending transaction.
   */
  valueAge(): bigint {
    return BigInt(this.confirmations) * BigInt(this.amount());
  }

  /** "txid:vout" */
  outpoint(): string {
    return `${this.tx.txid}:${this.output}`;
  }

  private txOut(): { amount: number } {
    const out = this.tx.outputs[this.output];
    if (out === undefined) {
      throw new InvalidSelectionArgsError(`tx ${this.tx.txid} has no output ${this.output}`);
    }
    return out;
  }
}
