/**
 * Error taxonomy.
 *
 * Only ConfigurationError ever reaches a caller as a thrown error. Transport
 * failures surface as `false` on a message's result and as diagnostics.
 */

export class RelayLogError extends Error {
	constructor(message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'RelayLogError';
	}
}

/** Missing or invalid configuration. Fatal at construction time. */
export class ConfigurationError extends RelayLogError {
	readonly field: string;

	constructor(field: string, message: string, options?: ErrorOptions) {
		super(message, options);
		this.name = 'ConfigurationError';
		this.field = field;
	}
}

export interface TransportErrorOptions extends ErrorOptions {
	httpStatus?: number;
}

/** A send that ended in failure — terminal for that message only. */
export class TransportError extends RelayLogError {
	readonly transportId: string;
	readonly httpStatus?: number;

	constructor(transportId: string, message: string, options?: TransportErrorOptions) {
		super(`[${transportId}] ${message}`, options);
		this.name = 'TransportError';
		this.transportId = transportId;
		this.httpStatus = options?.httpStatus;
	}
}
