import type { Translate } from './i18n';

interface CooldownManager {
  cooldowns: Map<string, number>;
  cooldownTime: number;
}

const managers = new Map<string, CooldownManager>();

setInterval(
  () => {
    const now = Date.now();
    for (const manager of managers.values()) {
      for (const [userId, cooldownEnd] of manager.cooldowns.entries()) {
        if (now >= cooldownEnd) {
          manager.cooldowns.delete(userId);
        }
      }
    }
  },
  5 * 60 * 1000,
).unref();

export function createCooldownManager(commandName: string, cooldownTime: number): CooldownManager {
  const manager = {
    cooldowns: new Map<string, number>(),
    cooldownTime,
  };
  managers.set(commandName, manager);
  return manager;
}

export function checkCooldown(
  manager: CooldownManager,
  userId: string,
  t: Translate,
): { onCooldown: boolean; timeLeft?: number; message?: string } {
  const now = Date.now();
  const cooldownEnd = manager.cooldowns.get(userId) || 0;

  if (now < cooldownEnd) {
    const timeLeft = Math.ceil((cooldownEnd - now) / 1000);
    const message = t('common.cooldown', { cooldown: timeLeft });
    return { onCooldown: true, timeLeft, message };
  }

  return { onCooldown: false };
}

export function setCooldown(manager: CooldownManager, userId: string): void {
  if (manager.cooldownTime <= 0) return;
  manager.cooldowns.set(userId, Date.now() + manager.cooldownTime);
}

export type { CooldownManager };
