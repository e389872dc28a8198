/**
 * Store a platform resolves to
 */
export enum StorePlatform {
  Apple = 'apple',
  Play = 'play',
  Unsupported = 'unsupported',
}

export function resolveStorePlatform(platform: string): StorePlatform {
  const mapping: Record<string, StorePlatform> = {
    ios: StorePlatform.Apple,
    android: StorePlatform.Play,
  };
  return mapping[platform.toLowerCase()] ?? StorePlatform.Unsupported;
}
