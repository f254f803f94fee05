/**
 * Manual mock for logger module
 */

const createMockLogger = () => ({
  info: jest.fn(),
  error: jest.fn(),
  warn: jest.fn(),
  debug: jest.fn(),
  child: jest.fn(),
});

export const mockLambdaLogger = createMockLogger();
mockLambdaLogger.child.mockReturnValue(mockLambdaLogger);

export const createLambdaLogger = jest.fn(() => mockLambdaLogger);

export const logLambdaInvocation = jest.fn();
export const logLambdaCompletion = jest.fn();
export const logLambdaError = jest.fn();
