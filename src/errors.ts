/**
 * Shared Error Factory for atlaspack domain errors.
 *
 * All functions are pure and return the structured MCP error response shape directly,
 * allowing tool handlers to do:
 *   return errors.cannotFitImage(name, size);
 *
 * Lower layers throw `new Error(errors.x(...).content[0].text)` so the message is
 * identical whichever layer reports it.
 */

/**
 * The standard MCP error response shape for domain errors.
 * Tool handlers return this object. The client reads the text and can self-correct.
 */
export interface DomainErrorResponse {
    isError: true;
    content: Array<{ type: 'text'; text: string }>;
}

/**
 * Base helper to construct a DomainErrorResponse from a message string.
 */
export function domainError(message: string): DomainErrorResponse {
    return {
        isError: true,
        content: [{ type: 'text', text: message }],
    };
}

/**
 * Message text of a DomainErrorResponse, for throwing from non-tool code.
 */
export function messageOf(response: DomainErrorResponse): string {
    return response.content[0].text;
}

export function invalidArgument(message: string): DomainErrorResponse {
    return domainError(`Invalid argument: ${message}`);
}

// ----------------------------------------------------------------------------
// packing
// ----------------------------------------------------------------------------

export function invalidPadding(pad: number): DomainErrorResponse {
    return domainError(`Invalid padding size: ${String(pad)}. Padding must be between 0 and 16.`);
}

export function cannotFitImage(name: string, size: number): DomainErrorResponse {
    return domainError(
        `Packing failed: image '${name}' does not fit in an empty ${String(size)}×${String(size)} atlas. Increase the size or reduce the padding.`,
    );
}

export function noImagesFound(): DomainErrorResponse {
    return domainError('No PNG images found in the given inputs.');
}

// ----------------------------------------------------------------------------
// input & output
// ----------------------------------------------------------------------------

export function inputNotFound(path: string): DomainErrorResponse {
    return domainError(`Input not found: ${path}`);
}

export function imageDecodeFailed(path: string): DomainErrorResponse {
    return domainError(`Failed to decode PNG: ${path}`);
}

export function cannotWritePath(path: string): DomainErrorResponse {
    return domainError(`Cannot write to path: ${path}`);
}
