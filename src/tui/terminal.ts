/**
 * blessed host: draws frames and turns terminal input into key names and
 * pointer positions. Everything else lives in the controller.
 */
import blessed from 'blessed';

import type { Frame, Line, Style } from './types';

export interface KeyInfo {
  name?: string;
  ctrl?: boolean;
  shift?: boolean;
  full?: string;
}

export interface TerminalHandlers {
  onKey: (key: string) => void;
  onPointer: (x: number, y: number) => void;
  onResize: (width: number, height: number) => void;
}

const namedKeys: Record<string, string> = {
  enter: 'enter',
  escape: 'esc',
  backspace: 'backspace',
  space: ' ',
  up: 'up',
  down: 'down',
  left: 'left',
  right: 'right',
  pageup: 'pageup',
  pagedown: 'pagedown',
  home: 'home',
  end: 'end',
};

/**
 * Key name understood by the controller, or null for keys it ignores
 */
export function toKeyEvent(ch: string | undefined, key: KeyInfo): string | null {
  const name = key.name ?? '';
  // blessed reports Enter twice, as "return" and as "enter"
  if (name === 'return') return null;
  if (name === 'tab') return key.shift ? 'shift+tab' : 'tab';
  if (key.ctrl && name) return `ctrl+${name}`;
  if (name in namedKeys) return namedKeys[name];
  if (ch && ch.length === 1 && ch >= ' ' && ch !== '\x7f') return ch;
  return null;
}

const styleTags: Record<Style, string> = {
  normal: '',
  title: '{bold}',
  active: '{black-fg}{cyan-bg}',
  disabled: '{gray-fg}',
  selected: '{black-fg}{white-bg}',
  editing: '{yellow-fg}',
  dim: '{gray-fg}',
  error: '{red-fg}',
  warning: '{yellow-fg}',
  status: '{white-fg}{blue-bg}',
  help: '{gray-fg}',
};

const escapeTags = (text: string): string =>
  text.replace(/[{}]/g, c => (c === '{' ? '{open}' : '{close}'));

export function toMarkup(line: Line): string {
  return line
    .map(({ text, style = 'normal' }) => {
      const open = styleTags[style];
      return open ? `${open}${escapeTags(text)}{/}` : escapeTags(text);
    })
    .join('');
}

const toNumber = (value: number | string): number =>
  typeof value === 'number' ? value : parseInt(value, 10) || 0;

export class Terminal {
  private screen: blessed.Widgets.Screen;
  private box: blessed.Widgets.BoxElement;

  constructor(handlers: TerminalHandlers, title = 'ldapnav') {
    this.screen = blessed.screen({ smartCSR: true, fullUnicode: true, title });
    this.box = blessed.box({
      parent: this.screen,
      top: 0,
      left: 0,
      width: '100%',
      height: '100%',
      tags: true,
    });
    this.screen.enableMouse();

    this.screen.on('keypress', (ch: string, key: blessed.Widgets.Events.IKeyEventArg) => {
      const name = toKeyEvent(ch, key);
      if (name !== null) handlers.onKey(name);
    });
    this.screen.on('mouse', (data: blessed.Widgets.Events.IMouseEventArg) => {
      if (data.action === 'mousedown') handlers.onPointer(data.x, data.y);
    });
    this.screen.on('resize', () => {
      handlers.onResize(this.width, this.height);
    });
  }

  get width(): number {
    return toNumber(this.screen.width);
  }

  get height(): number {
    return toNumber(this.screen.height);
  }

  draw(frame: Frame): void {
    this.box.setContent(frame.lines.map(toMarkup).join('\n'));
    this.screen.render();
  }

  destroy(): void {
    this.screen.destroy();
  }
}
