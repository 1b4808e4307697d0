/** A normalization stage returned a map whose dimensions do not match its input and output. */
export class ConsistencyError extends Error {
    constructor(public readonly stageName: string, reason: string) {
        super(`Stage "${stageName}" gave an incorrect mapping: ${reason}`);
        this.name = new.target.name;
    }
}
