const normalize = (name: string) => name.trim().toLowerCase();

/**
 * Map keyed by display name where lookups ignore case and surrounding whitespace. The name first
 * used for an entry is kept for display.
 */
export default class NameIndex<T> {
  private _entries = new Map<string, { name: string; value: T }>();

  get size() {
    return this._entries.size;
  }

  get = (name: string) => this._entries.get(normalize(name))?.value;

  has = (name: string) => this._entries.has(normalize(name));

  set = (name: string, value: T) => {
    const key = normalize(name);
    const existing = this._entries.get(key);
    this._entries.set(key, { name: existing?.name ?? name, value });
    return this;
  };

  delete = (name: string) => this._entries.delete(normalize(name));

  names = () => [...this._entries.values()].map(entry => entry.name);

  values = () => [...this._entries.values()].map(entry => entry.value);

  entries = (): Array<[string, T]> =>
    [...this._entries.values()].map(entry => [entry.name, entry.value]);
}
