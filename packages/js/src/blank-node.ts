import { v4 as uuidv4 } from 'uuid';

/**
 * Source of fresh blank node identifiers (`_:` prefixed).
 */
export interface BlankNodeGenerator {
  next(): string;
  /** A generator in its initial state, used for one expansion run. */
  fork(): BlankNodeGenerator;
}

/** `_:b0`, `_:b1`, … */
export class CounterBlankNodeGenerator implements BlankNodeGenerator {
  private counter = 0;

  constructor(private readonly prefix: string = 'b') {}

  next(): string {
    return `_:${this.prefix}${this.counter++}`;
  }

  fork(): CounterBlankNodeGenerator {
    return new CounterBlankNodeGenerator(this.prefix);
  }
}

/** `_:` followed by a random UUID v4 */
export class UuidBlankNodeGenerator implements BlankNodeGenerator {
  next(): string {
    return `_:${uuidv4()}`;
  }

  fork(): UuidBlankNodeGenerator {
    return this;
  }
}

/**
 * Maps input blank node labels to generated ones. One issuer lives for one
 * expansion run, so a label keeps its replacement within the run and
 * nothing carries over to the next.
 */
export class BlankNodeIssuer {
  private readonly issued = new Map<string, string>();

  private readonly generator: BlankNodeGenerator;

  constructor(generator: BlankNodeGenerator) {
    this.generator = generator.fork();
  }

  /** Relabels `label`, or issues an unattached identifier when omitted. */
  issue(label?: string): string {
    if (label === undefined) return this.generator.next();
    const existing = this.issued.get(label);
    if (existing !== undefined) return existing;
    const fresh = this.generator.next();
    this.issued.set(label, fresh);
    return fresh;
  }
}
