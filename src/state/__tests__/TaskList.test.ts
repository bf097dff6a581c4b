import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { TaskList } from '../TaskList';

describe('TaskList', () => {
  let tasks: TaskList;

  beforeEach(() => {
    let uuidCounter = 0;
    vi.stubGlobal('crypto', {
      randomUUID: vi.fn(() => `uuid-${++uuidCounter}`),
    });
    tasks = new TaskList();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('add', () => {
    it('appends an open task with a generated id', () => {
      const item = tasks.add('Write report');
      expect(item).toEqual({ id: 'uuid-1', text: 'Write report', done: false });
      expect(tasks.getAll()).toEqual([{ id: 'uuid-1', text: 'Write report', done: false }]);
    });

    it('trims the text', () => {
      expect(tasks.add('  Read notes  ')?.text).toBe('Read notes');
    });

    it('ignores blank text', () => {
      expect(tasks.add('   ')).toBeNull();
      expect(tasks.getAll()).toEqual([]);
    });

    it('accepts initial tasks in the constructor', () => {
      const seeded = new TaskList(['a', '', 'b']);
      expect(seeded.getAll().map(t => t.text)).toEqual(['a', 'b']);
    });
  });

  describe('check and toggle', () => {
    it('check marks a task done', () => {
      const item = tasks.add('a');
      tasks.check(item?.id ?? '');
      expect(tasks.getAll()[0].done).toBe(true);
    });

    it('toggle flips done both ways', () => {
      const item = tasks.add('a');
      const id = item?.id ?? '';
      tasks.toggle(id);
      expect(tasks.getAll()[0].done).toBe(true);
      tasks.toggle(id);
      expect(tasks.getAll()[0].done).toBe(false);
    });

    it('ignores unknown ids', () => {
      tasks.add('a');
      tasks.check('nope');
      tasks.toggle('nope');
      expect(tasks.getAll()[0].done).toBe(false);
    });
  });

  describe('remove', () => {
    it('deletes by id', () => {
      tasks.add('a');
      tasks.add('b');
      tasks.remove('uuid-1');
      expect(tasks.getAll().map(t => t.text)).toEqual(['b']);
    });
  });

  describe('pending', () => {
    it('lists only open tasks', () => {
      tasks.add('a');
      tasks.add('b');
      tasks.check('uuid-1');
      expect(tasks.pending().map(t => t.text)).toEqual(['b']);
    });
  });

  describe('autoCheckNext', () => {
    beforeEach(() => {
      tasks.add('a');
      tasks.add('b');
      tasks.add('c');
    });

    it('checks the first open task and moves it to the bottom', () => {
      const checked = tasks.autoCheckNext(true);
      expect(checked).toEqual({ id: 'uuid-1', text: 'a', done: true });
      expect(tasks.getAll().map(t => `${t.text}:${t.done}`)).toEqual(['b:false', 'c:false', 'a:true']);
    });

    it('keeps the position when not moving to the bottom', () => {
      tasks.autoCheckNext(false);
      expect(tasks.getAll().map(t => `${t.text}:${t.done}`)).toEqual(['a:true', 'b:false', 'c:false']);
    });

    it('skips tasks that are already done', () => {
      tasks.check('uuid-1');
      const checked = tasks.autoCheckNext(false);
      expect(checked?.text).toBe('b');
    });

    it('returns null when everything is done', () => {
      tasks.autoCheckNext(true);
      tasks.autoCheckNext(true);
      tasks.autoCheckNext(true);
      expect(tasks.autoCheckNext(true)).toBeNull();
      expect(tasks.getAll().map(t => t.text)).toEqual(['a', 'b', 'c']);
    });
  });

  describe('getAll', () => {
    it('returns copies', () => {
      tasks.add('a');
      const all = tasks.getAll();
      all[0].done = true;
      all.push({ id: 'x', text: 'x', done: false });
      expect(tasks.getAll()).toEqual([{ id: 'uuid-1', text: 'a', done: false }]);
    });
  });
});
