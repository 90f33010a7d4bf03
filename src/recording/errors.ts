export type StatusError = Error & { status?: number };

export const createError = (message: string, status = 500): StatusError => {
  const err: StatusError = new Error(message);
  err.status = status;
  return err;
};

export const errorMessage = (err: unknown): string => {
  if (err instanceof Error) return err.message;
  return String(err);
};
