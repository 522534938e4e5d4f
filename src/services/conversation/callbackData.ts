import type { Platform } from '@/types/social';
import { isValidHandle } from '@/services/social/target';

export const LATEST_COMMANDS = ['latest', 'xlatest', 'iglatest'] as const;
export type LatestCommand = (typeof LATEST_COMMANDS)[number];

export const MENU_ACTIONS = ['x', 'ig', 'auto', 'help'] as const;
export type MenuAction = (typeof MENU_ACTIONS)[number];

export type CallbackAction =
  | { type: 'page'; command: LatestCommand; account: string; pageIndex: number }
  | { type: 'refresh'; command: LatestCommand; account: string }
  | { type: 'menu'; action: MenuAction };

export function isLatestCommand(value: string): value is LatestCommand {
  return LATEST_COMMANDS.some((command) => command === value);
}

function isMenuAction(value: string): value is MenuAction {
  return MENU_ACTIONS.some((action) => action === value);
}

export function platformForCommand(command: LatestCommand): Platform | null {
  if (command === 'xlatest') return 'x';
  if (command === 'iglatest') return 'ig';
  return null;
}

export function commandForPlatform(platform: Platform): LatestCommand {
  return platform === 'x' ? 'xlatest' : 'iglatest';
}

export function commandForMenu(action: Exclude<MenuAction, 'help'>): LatestCommand {
  if (action === 'x') return 'xlatest';
  if (action === 'ig') return 'iglatest';
  return 'latest';
}

export function encodeCallback(action: CallbackAction): string {
  switch (action.type) {
    case 'page':
      return `page_${action.command}_${action.account}_${action.pageIndex}`;
    case 'refresh':
      return `refresh_${action.command}_${action.account}`;
    case 'menu':
      return `menu_${action.action}`;
  }
}

/**
 * Parses button payloads. Accounts may contain underscores, so the command
 * is read from the front and the page index from the back.
 */
export function decodeCallback(data: string): CallbackAction | null {
  const [type, ...rest] = data.split('_');

  if (type === 'menu') {
    const action = rest.join('_');
    return isMenuAction(action) ? { type: 'menu', action } : null;
  }

  const [command, ...tail] = rest;
  if (!command || !isLatestCommand(command)) return null;

  if (type === 'refresh') {
    const account = tail.join('_');
    return isValidHandle(account) ? { type: 'refresh', command, account } : null;
  }

  if (type === 'page') {
    const indexPart = tail.pop();
    const account = tail.join('_');
    if (!indexPart || !/^\d+$/.test(indexPart) || !isValidHandle(account)) return null;
    return { type: 'page', command, account, pageIndex: parseInt(indexPart, 10) };
  }

  return null;
}
