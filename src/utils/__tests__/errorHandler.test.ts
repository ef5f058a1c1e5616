import {
    ConvergenceError,
    ErrorSeverity,
    InvalidRadiusError,
    MeshLayoutError,
    logError,
    toError,
    withErrorLogging
} from '../errorHandler';

describe('errorHandler', () => {
    let errorSpy: jest.SpyInstance;
    let warnSpy: jest.SpyInstance;
    let logSpy: jest.SpyInstance;

    beforeEach(() => {
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('error classes', () => {
        test('carry a name, a timestamp and their context field', () => {
            const error = new InvalidRadiusError(-1);
            expect(error).toBeInstanceOf(Error);
            expect(error.name).toBe('InvalidRadiusError');
            expect(error.message).toBe('Invalid radius -1: radius must be a positive finite number');
            expect(error.field).toBe('radius');
            expect(Number.isNaN(Date.parse(error.timestamp))).toBe(false);
        });

        test('keep the offending values', () => {
            expect(new ConvergenceError('stuck', 40).iterations).toBe(40);
            expect(new MeshLayoutError('bad layout', 61).vertexCount).toBe(61);
        });
    });

    describe('logError', () => {
        test('routes by severity', () => {
            const error = new Error('boom');
            logError(error, 'Critical', ErrorSeverity.CRITICAL);
            logError(error, 'High', ErrorSeverity.HIGH);
            logError(error, 'Medium', ErrorSeverity.MEDIUM);
            logError(error, 'Low', ErrorSeverity.LOW);

            expect(errorSpy).toHaveBeenCalledWith('🔴 [CRITICAL ERROR] Critical:', expect.any(Object));
            expect(errorSpy).toHaveBeenCalledWith('❌ [ERROR] High:', expect.any(Object));
            expect(warnSpy).toHaveBeenCalledWith('⚠️  [WARNING] Medium:', expect.any(Object));
            expect(logSpy).toHaveBeenCalledWith('ℹ️  [INFO] Low:', expect.any(Object));
        });

        test('builds a structured entry', () => {
            const entry = logError(new MeshLayoutError('bad layout', 61), 'Mesh', ErrorSeverity.HIGH, { faces: 3 });
            expect(entry).toEqual(expect.objectContaining({
                context: 'Mesh',
                severity: 'high',
                name: 'MeshLayoutError',
                message: 'bad layout',
                field: 'vertices',
                faces: 3
            }));
        });

        test('omits the field for plain errors', () => {
            const entry = logError(new Error('plain'));
            expect(entry.context).toBe('Unknown');
            expect(entry.severity).toBe('medium');
            expect('field' in entry).toBe(false);
        });
    });

    test('toError wraps non-errors', () => {
        const wrapped = toError('text');
        expect(wrapped).toBeInstanceOf(Error);
        expect(wrapped.message).toBe('text');

        const original = new Error('kept');
        expect(toError(original)).toBe(original);
    });

    describe('withErrorLogging', () => {
        test('returns the operation result without logging', () => {
            expect(withErrorLogging(() => 42, 'Answer')).toBe(42);
            expect(errorSpy).not.toHaveBeenCalled();
        });

        test('logs and rethrows the same error', () => {
            const failure = new ConvergenceError('stuck', 5);
            expect(() => withErrorLogging(() => {
                throw failure;
            }, 'Average')).toThrow(failure);
            expect(errorSpy).toHaveBeenCalledWith(
                '❌ [ERROR] Average:',
                expect.objectContaining({ name: 'ConvergenceError', message: 'stuck' })
            );
        });
    });
});
