import { ResolutionError } from '../errors';

export interface CallFrame {
  procedure: string;
  /** Line of the call site; null for the run's entry call. */
  line: number | null;
}

/** Active procedure calls, innermost last. */
export class CallStack {
  private frames: CallFrame[] = [];

  constructor(private readonly max_depth: number) {}

  /** Enter a procedure. Throws CALL_DEPTH_EXCEEDED past max_depth frames. */
  push(frame: CallFrame): void {
    if (this.frames.length >= this.max_depth) {
      throw new ResolutionError(
        'CALL_DEPTH_EXCEEDED',
        `call depth limit of ${this.max_depth} exceeded calling '${frame.procedure}'`,
        { line: frame.line ?? undefined, resource: frame.procedure, procedure_trace: this.trace() }
      );
    }
    this.frames.push({ ...frame });
  }

  pop(): CallFrame {
    const frame = this.frames.pop();
    if (!frame) throw new Error('cannot pop an empty call stack');
    return frame;
  }

  get depth(): number {
    return this.frames.length;
  }

  /** Procedure names, outermost first. */
  trace(): string[] {
    return this.frames.map((f) => f.procedure);
  }
}
