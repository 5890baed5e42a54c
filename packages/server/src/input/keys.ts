/**
 * Key-name normalization for browser-style key names
 */

const KEY_MAP: Readonly<Record<string, string>> = {
  Enter: "enter",
  Backspace: "backspace",
  Delete: "delete",
  Tab: "tab",
  Escape: "esc",
  Space: "space",
  " ": "space",
  ArrowUp: "up",
  ArrowDown: "down",
  ArrowLeft: "left",
  ArrowRight: "right",
  Home: "home",
  End: "end",
  PageUp: "pageup",
  PageDown: "pagedown",
  Insert: "insert",
  F1: "f1",
  F2: "f2",
  F3: "f3",
  F4: "f4",
  F5: "f5",
  F6: "f6",
  F7: "f7",
  F8: "f8",
  F9: "f9",
  F10: "f10",
  F11: "f11",
  F12: "f12",
};

const MODIFIERS: Readonly<Record<string, string>> = {
  ctrl: "ctrl",
  control: "ctrl",
  alt: "alt",
  option: "alt",
  shift: "shift",
  win: "win",
  cmd: "win",
  meta: "win",
  super: "win",
};

/**
 * Unmapped keys fall back to their lower-cased name
 */
export function normalizeKey(key: string): string {
  return Object.hasOwn(KEY_MAP, key) ? KEY_MAP[key] : key.toLowerCase();
}

export function normalizeChordKey(key: string): string {
  const lower = key.toLowerCase();
  return Object.hasOwn(MODIFIERS, lower) ? MODIFIERS[lower] : normalizeKey(key);
}
