import type { JSX } from "react";
import type { KeyEvent } from "@shared/types";
import { useLauncherKeys } from "../../hooks/useLauncherKeys";
import type { LauncherViewModel } from "../../services/shortcutRows";
import { LauncherScreen } from "./LauncherScreen";

export interface LauncherViewProps {
  model: LauncherViewModel;
  onKey: (event: KeyEvent) => void;
}

/** LauncherScreen wired to terminal input. */
export function LauncherView({ model, onKey }: LauncherViewProps): JSX.Element {
  useLauncherKeys(onKey);
  return <LauncherScreen model={model} />;
}
