import type {
  CondaBuildParams,
  CondaBuildResult,
  CondaMetadataParams,
  CondaMetadataResult,
  InitializeParams,
  InitializeResult,
} from './types.js';

/**
 * An initialized backend. A procedure the backend does not implement is left
 * undefined and the server answers it with `InvalidRequest`.
 */
export interface Protocol {
  getCondaMetadata?(params: CondaMetadataParams): Promise<CondaMetadataResult>;
  buildConda?(params: CondaBuildParams): Promise<CondaBuildResult>;
}

export interface InitializedProtocol<P extends Protocol = Protocol> {
  readonly protocol: P;
  readonly result: InitializeResult;
}

/** Creates a {@link Protocol} from the `initialize` request. */
export interface ProtocolFactory<P extends Protocol = Protocol> {
  initialize(params: InitializeParams): Promise<InitializedProtocol<P>>;
}
