export type UserSettings = {
  apiKey: string;
};

export function createDefaultUserSettings(): UserSettings {
  return { apiKey: '' };
}
