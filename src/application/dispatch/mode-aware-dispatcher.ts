import type { OperatingMode } from '../../runtime/operating-mode.js';
import type { Result } from '../../runtime/result.js';
import { ok } from '../../runtime/result.js';
import { assertNever } from '../../runtime/assert-never.js';

export interface RequestHandler<TRequest, TResponse> {
  handle(request: TRequest): Promise<TResponse>;
}

/**
 * Builds the handler of each mode. Only the factory of the resolved mode is
 * called. The live factory may refuse (missing prerequisites), which must
 * surface before the service accepts traffic.
 */
export interface ModeHandlerFactories<TRequest, TResponse, E> {
  readonly simulate: () => RequestHandler<TRequest, TResponse>;
  readonly live: () => Result<RequestHandler<TRequest, TResponse>, E>;
}

/**
 * Routes every request to the handler of a mode fixed at construction.
 */
export class ModeAwareDispatcher<TRequest, TResponse> {
  private constructor(
    readonly mode: OperatingMode,
    private readonly handler: RequestHandler<TRequest, TResponse>
  ) {}

  static create<TRequest, TResponse, E>(
    mode: OperatingMode,
    factories: ModeHandlerFactories<TRequest, TResponse, E>
  ): Result<ModeAwareDispatcher<TRequest, TResponse>, E> {
    switch (mode.kind) {
      case 'simulate':
        return ok(new ModeAwareDispatcher(mode, factories.simulate()));
      case 'live': {
        const handler = factories.live();
        return handler.kind === 'ok' ? ok(new ModeAwareDispatcher(mode, handler.value)) : handler;
      }
      default:
        return assertNever(mode);
    }
  }

  dispatch(request: TRequest): Promise<TResponse> {
    return this.handler.handle(request);
  }
}
