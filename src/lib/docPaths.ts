
export function threadPath(threadKey: string): string {
  return `threads/${threadKey}`;
}

export function gameIndexPath(threadKey: string): string {
  return `${threadPath(threadKey)}/games`;
}

export function gameDocPath(threadKey: string, dateKey: string): string {
  return `${gameIndexPath(threadKey)}/${dateKey}`;
}

export function gameDocLockKey(threadKey: string, dateKey: string): string {
  return `lock:${gameDocPath(threadKey, dateKey)}`;
}
