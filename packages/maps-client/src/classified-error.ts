/**
 * An error tagged with the retry decision it drives.
 */
export type ClassifiedError<E> =
  | { readonly kind: 'transient'; readonly error: E }
  | { readonly kind: 'permanent'; readonly error: E };

export const transient = <E>(error: E): ClassifiedError<E> => ({ kind: 'transient', error });

export const permanent = <E>(error: E): ClassifiedError<E> => ({ kind: 'permanent', error });

export const isTransient = <E>(classified: ClassifiedError<E>): boolean => classified.kind === 'transient';

export const isPermanent = <E>(classified: ClassifiedError<E>): boolean => classified.kind === 'permanent';
