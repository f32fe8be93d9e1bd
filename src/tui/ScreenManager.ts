import blessed from 'blessed';
import type { IPrompter, PromptDecision } from '../types/index.js';
import { RenamePromptView } from './components/RenamePromptView.js';

/**
 * Full-screen prompt used by `--interactive`. The screen is created on the first
 * question and torn down by `dispose`, so non-interactive runs never touch the terminal.
 */
export class ScreenManager implements IPrompter {
  private screen: blessed.Widgets.Screen | null = null;
  private prompt = new RenamePromptView();

  private ensureScreen(): blessed.Widgets.Screen {
    if (this.screen) return this.screen;
    const screen = blessed.screen({ smartCSR: true, title: 'normalize-filename' });
    this.prompt.mount(screen);
    this.screen = screen;
    return screen;
  }

  async confirm(from: string, proposed: string): Promise<PromptDecision> {
    this.ensureScreen();
    return await this.prompt.ask(from, proposed);
  }

  dispose(): void {
    if (!this.screen) return;
    this.prompt.unmount();
    this.screen.destroy();
    this.screen = null;
  }
}
