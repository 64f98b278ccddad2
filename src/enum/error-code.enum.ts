/**
 * Error messages raised by the solver and its front-ends.
 * Placeholders in braces are filled in by the error classes.
 */
export enum ErrorCode {
    ERR_INPUT_INCOMPLETE = 'Unexpected end of input: read {cells} of 81 cells',
    ERR_CONFLICT = 'Conflict: {digit} cannot be placed at {square}',
    ERR_UNSOLVABLE = 'No solution found',
    ERR_COORDINATE_INVALID = 'Row and column must be integers from 0 to 8',
    ERR_DIGIT_INVALID = 'Digit must be an integer from 1 to 9',
    ERR_CONFIG_INVALID = 'Invalid server configuration',
    ERR_REQUEST_INVALID = 'Invalid request body',
}
