import type { TaskItem } from '../shared/types';

/** Ordered to-do list; checked-off items can be pushed to the bottom */
export class TaskList {
  private _items: TaskItem[] = [];

  constructor(texts: string[] = []) {
    texts.forEach(t => this.add(t));
  }

  add(text: string): TaskItem | null {
    const trimmed = text.trim();
    if (!trimmed) return null;
    const item: TaskItem = { id: crypto.randomUUID(), text: trimmed, done: false };
    this._items.push(item);
    return { ...item };
  }

  toggle(id: string): void {
    const item = this._items.find(t => t.id === id);
    if (item) item.done = !item.done;
  }

  check(id: string): void {
    const item = this._items.find(t => t.id === id);
    if (item) item.done = true;
  }

  remove(id: string): void {
    this._items = this._items.filter(t => t.id !== id);
  }

  getAll(): TaskItem[] {
    return this._items.map(t => ({ ...t }));
  }

  pending(): TaskItem[] {
    return this.getAll().filter(t => !t.done);
  }

  /** Check off the first open task, optionally moving it to the end of the list */
  autoCheckNext(moveToBottom: boolean): TaskItem | null {
    const idx = this._items.findIndex(t => !t.done);
    if (idx === -1) return null;
    const [item] = this._items.splice(idx, 1);
    item.done = true;
    if (moveToBottom) {
      this._items.push(item);
    } else {
      this._items.splice(idx, 0, item);
    }
    return { ...item };
  }
}
