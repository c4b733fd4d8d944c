/**
 * Diagnostics collected while interpreting pages. Nothing is printed; each
 * distinct (kind, key) pair is recorded once and forwarded to the optional
 * `onWarning` callback.
 */

export type WarningKind =
  /** Operator outside the known set */
  | 'unknown-operator'
  /** Operands that do not match the operator's signature */
  | 'malformed-operator'
  /** Construct that is recognized but not drawn (shadings, clipping, patterns) */
  | 'unsupported'
  /** Font, XObject, ExtGState or color space name absent from the resources */
  | 'resource-not-found'
  /** Image or form payload that could not be decoded */
  | 'decode-failure'
  /** Unbalanced save/restore or text object operators */
  | 'stack'
  /** Form nesting beyond the configured depth */
  | 'recursion';

export interface Warning {
  readonly kind: WarningKind;
  /** Distinguishes causes within a kind: operator name, resource name, filter... */
  readonly key: string;
  readonly message: string;
}

export type WarningListener = (warning: Warning) => void;

export class WarningLog {
  private readonly entries: Warning[] = [];
  private readonly seen = new Set<string>();

  constructor(private readonly listener?: WarningListener) {}

  /** Record a warning; repeats of the same kind and key are dropped. Returns true when recorded. */
  report(kind: WarningKind, key: string, message: string): boolean {
    const id = `${kind}\u0000${key}`;
    if (this.seen.has(id)) return false;
    this.seen.add(id);

    const warning: Warning = { kind, key, message };
    this.entries.push(warning);
    this.listener?.(warning);
    return true;
  }

  has(kind: WarningKind, key?: string): boolean {
    return this.entries.some((w) => w.kind === kind && (key === undefined || w.key === key));
  }

  get all(): readonly Warning[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }
}
