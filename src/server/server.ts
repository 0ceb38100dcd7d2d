/**
 * JSON-RPC front of a backend. A connection starts uninitialized; the first
 * successful `initialize` creates the backend, and only then are the `conda/*`
 * procedures served.
 */

import {
  createMessageConnection,
  ErrorCodes,
  ResponseError,
  type Message,
  type MessageConnection,
  type MessageReader,
  type MessageWriter,
} from 'vscode-languageserver/node.js';

import { renderDiagnosticReport } from '../diagnostics/diagnostics.js';
import type { Protocol, ProtocolFactory } from '../protocol/protocol.js';
import {
  METHODS,
  type CondaBuildResult,
  type CondaMetadataResult,
  type InitializeResult,
  type MethodName,
} from '../protocol/types.js';
import { protocolValidators, type ParamsValidator } from '../protocol/validation.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { FramingError } from './line-framing.js';
import { ReadWriteLock } from './rw-lock.js';

/** JSON-RPC error code for failures reported by the backend itself. */
export const BACKEND_ERROR_CODE = -32000;

type ServerState =
  | { readonly kind: 'uninitialized'; readonly factory: ProtocolFactory }
  | { readonly kind: 'initialized'; readonly protocol: Protocol };

/** Converts anything thrown by a backend into the error sent to the client. */
export function toResponseError(error: unknown): ResponseError<unknown> {
  if (error instanceof ResponseError) return error;
  const report = renderDiagnosticReport(error);
  return new ResponseError(BACKEND_ERROR_CODE, report.message, report);
}

/** Answer to a line that never became a request, so its id is unknown. */
interface FramingErrorResponse extends Message {
  readonly id: null;
  readonly error: { readonly code: number; readonly message: string };
}

function invalidRequest(message: string): ResponseError<void> {
  return new ResponseError(ErrorCodes.InvalidRequest, message);
}

/**
 * Per-connection request handling. Each dispatcher owns its own state, so two
 * connections never share a backend.
 */
export class RequestDispatcher {
  private state: ServerState;
  private readonly lock = new ReadWriteLock();

  constructor(
    factory: ProtocolFactory,
    private readonly logger: Logger
  ) {
    this.state = { kind: 'uninitialized', factory };
  }

  get initialized(): boolean {
    return this.state.kind === 'initialized';
  }

  async initialize(raw: unknown): Promise<InitializeResult> {
    const params = this.validate(METHODS.initialize, protocolValidators().initialize, raw);
    return this.lock.write(async () => {
      const state = this.state;
      if (state.kind === 'initialized') {
        throw invalidRequest('the backend is already initialized');
      }
      const { protocol, result } = await this.invoke(METHODS.initialize, () => state.factory.initialize(params));
      this.state = { kind: 'initialized', protocol };
      return result;
    });
  }

  async condaMetadata(raw: unknown): Promise<CondaMetadataResult> {
    const params = this.validate(METHODS.condaMetadata, protocolValidators().condaMetadata, raw);
    return this.lock.read(async () => {
      const protocol = this.requireInitialized(METHODS.condaMetadata);
      const procedure = protocol.getCondaMetadata?.bind(protocol);
      if (procedure === undefined) {
        throw invalidRequest(`the backend does not support ${METHODS.condaMetadata}`);
      }
      return this.invoke(METHODS.condaMetadata, () => procedure(params));
    });
  }

  async condaBuild(raw: unknown): Promise<CondaBuildResult> {
    const params = this.validate(METHODS.condaBuild, protocolValidators().condaBuild, raw);
    return this.lock.read(async () => {
      const protocol = this.requireInitialized(METHODS.condaBuild);
      const procedure = protocol.buildConda?.bind(protocol);
      if (procedure === undefined) {
        throw invalidRequest(`the backend does not support ${METHODS.condaBuild}`);
      }
      return this.invoke(METHODS.condaBuild, () => procedure(params));
    });
  }

  private validate<T>(method: MethodName, validator: ParamsValidator<T>, raw: unknown): T {
    const result = validator(raw);
    if (result.ok) return result.value;
    this.logger.warn('invalid params', { method, errors: result.errors });
    throw new ResponseError(ErrorCodes.InvalidParams, `invalid params for ${method}: ${result.errors.join('; ')}`);
  }

  private requireInitialized(method: MethodName): Protocol {
    if (this.state.kind === 'uninitialized') {
      throw invalidRequest(`the backend is not initialized; call '${METHODS.initialize}' before '${method}'`);
    }
    return this.state.protocol;
  }

  private async invoke<T>(method: MethodName, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      this.logger.error(`${method} failed`, error);
      throw toResponseError(error);
    }
  }
}

export class Server {
  constructor(
    private readonly factory: ProtocolFactory,
    private readonly logger: Logger = createLogger('server')
  ) {}

  createDispatcher(): RequestDispatcher {
    return new RequestDispatcher(this.factory, this.logger);
  }

  /** Starts serving one connection and returns it without waiting for it to close. */
  attach(reader: MessageReader, writer: MessageWriter): MessageConnection {
    const dispatcher = this.createDispatcher();
    const connection = createMessageConnection(reader, writer);

    connection.onRequest(METHODS.initialize, (params: unknown) => dispatcher.initialize(params));
    connection.onRequest(METHODS.condaMetadata, (params: unknown) => dispatcher.condaMetadata(params));
    connection.onRequest(METHODS.condaBuild, (params: unknown) => dispatcher.condaBuild(params));
    connection.onError(([error]) => this.logger.error('connection error', error));
    reader.onError(error => {
      if (error instanceof FramingError) this.answerFramingError(writer, error);
    });

    connection.listen();
    return connection;
  }

  private answerFramingError(writer: MessageWriter, error: FramingError): void {
    const response: FramingErrorResponse = {
      jsonrpc: '2.0',
      id: null,
      error: { code: error.code, message: error.message },
    };
    writer.write(response).catch((writeError: unknown) =>
      this.logger.warn('failed to answer an unreadable message', {
        error: writeError instanceof Error ? writeError.message : String(writeError),
      })
    );
  }

  /** Serves one connection until its reader closes. */
  serve(reader: MessageReader, writer: MessageWriter): Promise<void> {
    return new Promise(resolve => {
      const connection = this.attach(reader, writer);
      connection.onClose(() => {
        this.logger.debug('connection closed');
        connection.dispose();
        resolve();
      });
    });
  }
}
