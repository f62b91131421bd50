function join(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}${path}`;
}

export function verificationLink(baseUrl: string, token: string): string {
  return join(baseUrl, `/api/auth/confirmed_email/${encodeURIComponent(token)}`);
}

export function passwordResetLink(baseUrl: string, token: string): string {
  return join(baseUrl, `/reset-password?token=${encodeURIComponent(token)}`);
}
