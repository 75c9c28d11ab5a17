/**
 * Client request ids for `add_order`: zero-padded, 10 digits, increasing per process
 */

const ORDER_ID_WIDTH = 10;
const MAX_ORDER_ID = 9_999_999_999;

export class OrderIdGenerator {
  private nextValue: number;

  constructor(start = 1) {
    this.nextValue = start;
  }

  next(): string {
    const id = String(this.nextValue).padStart(ORDER_ID_WIDTH, "0");
    this.nextValue = this.nextValue >= MAX_ORDER_ID ? 1 : this.nextValue + 1;
    return id;
  }
}
