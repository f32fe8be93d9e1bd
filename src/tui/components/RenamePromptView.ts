import blessed from 'blessed';
import type { PromptDecision } from '../../types/index.js';
import { BaseView } from '../BaseView.js';

const ANSWER_KEYS = ['y', 'n', 'e', 'q', 'escape', 'C-c'];

export class RenamePromptView extends BaseView {
  private box!: blessed.Widgets.BoxElement;
  private editor!: blessed.Widgets.TextboxElement;

  mount(screen: blessed.Widgets.Screen): void {
    this.screen = screen;
    this.box = blessed.box({
      parent: screen,
      top: 'center',
      left: 'center',
      width: '90%',
      height: 9,
      border: 'line',
      label: ' Rename ',
      tags: false,
      keys: true,
      padding: { left: 1, right: 1 },
      style: { border: { fg: 'cyan' }, label: { fg: 'cyan', bold: true } }
    });
    this.editor = blessed.textbox({
      parent: this.box,
      bottom: 0,
      left: 0,
      right: 0,
      height: 1,
      hidden: true,
      keys: true,
      style: { fg: 'black', bg: 'white' }
    });
  }

  ask(from: string, proposed: string): Promise<PromptDecision> {
    return new Promise((resolve) => {
      const onKey = (_ch: unknown, key: blessed.Widgets.Events.IKeyEventArg) => {
        const finish = (decision: PromptDecision) => {
          this.box.unkey(ANSWER_KEYS.join(','), onKey);
          resolve(decision);
        };
        switch (key.full) {
          case 'y':
            finish({ kind: 'rename', target: proposed });
            return;
          case 'n':
            finish({ kind: 'skip' });
            return;
          case 'e':
            this.box.unkey(ANSWER_KEYS.join(','), onKey);
            this.edit(proposed, (edited) => {
              if (edited === null) {
                this.showQuestion(from, proposed);
                this.box.key(ANSWER_KEYS, onKey);
                return;
              }
              resolve({ kind: 'rename', target: edited });
            });
            return;
          default:
            finish({ kind: 'quit' });
        }
      };
      this.showQuestion(from, proposed);
      this.box.key(ANSWER_KEYS, onKey);
    });
  }

  private showQuestion(from: string, proposed: string) {
    this.editor.hide();
    this.box.setContent(`${from}\n  -> ${proposed}\n\n[y] rename  [n] skip  [e] edit  [q] quit`);
    this.box.focus();
    this.render();
  }

  private edit(proposed: string, done: (edited: string | null) => void) {
    this.box.setContent('Edit the new name, Enter to accept, Esc to go back');
    this.editor.setValue(proposed);
    this.editor.show();
    this.editor.focus();
    this.render();
    this.editor.readInput((err: unknown, value?: string) => {
      this.editor.hide();
      this.render();
      done(err || typeof value !== 'string' ? null : value);
    });
  }

  unmount(): void {
    this.screen = null;
    this.editor?.destroy();
    this.box?.destroy();
  }
}
