import type { KeyEvent } from "@shared/types";
import type { RenderSurface } from "../main/runtime/control-loop";
import type { KeySource } from "../main/runtime/key-queue";
import type { LauncherViewModel } from "../renderer/services/shortcutRows";

export interface RecordingSurface extends RenderSurface {
  frames: LauncherViewModel[];
  closed: boolean;
}

/** Surface that keeps every rendered view model. */
export function createRecordingSurface(): RecordingSurface {
  const surface: RecordingSurface = {
    frames: [],
    closed: false,
    render: (model) => {
      surface.frames.push(model);
    },
    close: () => {
      surface.closed = true;
    }
  };
  return surface;
}

/**
 * Key source replaying `events` in order, then reporting timeouts. Once the
 * script is exhausted it sends a cancel so a loop under test always ends.
 */
export function createScriptedKeys(events: KeyEvent[], idlePollsBeforeCancel = 0): KeySource & { polls: number } {
  const queue = [...events];
  let idle = 0;
  const source = {
    polls: 0,
    poll: async (): Promise<KeyEvent | null> => {
      source.polls += 1;
      const next = queue.shift();
      if (next) return next;
      if (idle < idlePollsBeforeCancel) {
        idle += 1;
        return null;
      }
      return { type: "cancel" };
    }
  };
  return source;
}
