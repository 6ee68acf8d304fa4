import os from 'os';

export function currentOperator(): string {
  const fromEnv = process.env.USER || process.env.USERNAME;
  if (fromEnv) return fromEnv;
  try {
    return os.userInfo().username || 'Unknown';
  } catch {
    // no passwd entry for the uid (common in containers)
    return 'Unknown';
  }
}

export function currentHost(): string {
  return process.env.HOSTNAME || process.env.COMPUTERNAME || os.hostname() || 'Unknown';
}
