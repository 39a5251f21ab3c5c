import { render, type Instance, type RenderOptions } from "ink";
import type { KeyEvent } from "@shared/types";
import type { RenderSurface } from "../main/runtime/control-loop";
import { LauncherView } from "./components/launcher";
import type { LauncherViewModel } from "./services/shortcutRows";

/**
 * Terminal rendering surface backed by Ink.
 *
 * The first `render` mounts the app, later calls rerender it with the new view
 * model. Key events decoded by Ink are handed to `onKey`.
 */
export class InkSurface implements RenderSurface {
  private instance: Instance | null = null;

  constructor(
    private readonly onKey: (event: KeyEvent) => void,
    private readonly options: Pick<RenderOptions, "stdin" | "stdout" | "stderr"> = {}
  ) {}

  render(model: LauncherViewModel): void {
    const tree = <LauncherView model={model} onKey={this.onKey} />;
    if (this.instance) {
      this.instance.rerender(tree);
      return;
    }
    this.instance = render(tree, { ...this.options, exitOnCtrlC: false });
  }

  close(): void {
    this.instance?.unmount();
    this.instance = null;
  }
}
