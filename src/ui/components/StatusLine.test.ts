import { describe, it, expect } from 'vitest';
import { StatusLine, describeStatus } from './StatusLine';
import { createInitialState, type AppState } from '../../core/AppState';

const idle = createInitialState();

describe('describeStatus', () => {
  it('STAT-001: busy states', () => {
    expect(describeStatus({ ...idle, status: 'rendering' })).toEqual({ text: 'Rendering…', tone: 'muted' });
    expect(describeStatus({ ...idle, status: 'saving' })).toEqual({ text: 'Saving…', tone: 'muted' });
  });

  it('STAT-002: busy wins over a previous error', () => {
    expect(describeStatus({ ...idle, status: 'rendering', lastError: 'old' }).text).toBe('Rendering…');
  });

  it('STAT-003: error wins over the saved path', () => {
    const state: AppState = { ...idle, lastError: 'Enter a file name before saving', lastSavedPath: 'a.exr' };
    expect(describeStatus(state)).toEqual({ text: 'Enter a file name before saving', tone: 'error' });
  });

  it('STAT-004: saved path', () => {
    expect(describeStatus({ ...idle, lastSavedPath: 'a.exr' })).toEqual({ text: 'Would save a.exr', tone: 'success' });
  });

  it('STAT-005: nothing to report', () => {
    expect(describeStatus(idle)).toEqual({ text: '', tone: 'muted' });
  });
});

describe('StatusLine', () => {
  it('STAT-010: renders the description with its tone', () => {
    const line = new StatusLine();
    line.update({ ...idle, lastError: 'Render pass failed: boom' });
    const el = line.render();
    expect(el.textContent).toBe('Render pass failed: boom');
    expect(el.dataset.tone).toBe('error');
    expect(el.getAttribute('role')).toBe('status');
    line.dispose();
    expect(el.textContent).toBe('');
  });
});
