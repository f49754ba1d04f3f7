type ErrorClass<T extends Error> = new (...args: never[]) => T;

export function captureError<T extends Error>(fn: () => unknown, type: ErrorClass<T>): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected function to throw ${type.name}.`);
}

export async function captureAsyncError<T extends Error>(promise: Promise<unknown>, type: ErrorClass<T>): Promise<T> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) {
      return error;
    }
    throw error;
  }
  throw new Error(`Expected promise to reject with ${type.name}.`);
}
