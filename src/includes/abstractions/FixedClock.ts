import { IClock } from "./IClock";

export class FixedClock implements IClock {
  private readonly date: Date;

  constructor(date: Date) {
    this.date = date;
  }

  now(): Date {
    return this.date;
  }
}
