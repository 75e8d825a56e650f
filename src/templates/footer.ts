const SEPARATOR = '\n\n—\n';

export const addFooter = (message: string, footer: string): string => `${message}${SEPARATOR}${footer}`;
