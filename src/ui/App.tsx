import { useState, useEffect, useCallback } from "react";
import { Box, Text, useApp, useInput } from "ink";
import { ThemePreview } from "./ThemePreview.js";
import { TabList } from "./TabList.js";
import { StatusBar } from "./StatusBar.js";
import { SettingsModal } from "./SettingsModal.js";
import type { Settings } from "./SettingsModal.js";
import { useTerminalSize } from "./hooks/useTerminalSize.js";
import type { Runtime } from "../app.js";
import type { SessionState } from "../state/types.js";
import type { ThemeSpec } from "../theme/types.js";

const PREVIEW_HEIGHT = 8;
const WARNING_TTL_MS = 8000;

interface AppProps {
  runtime: Runtime;
  version: string;
  /** Registers a listener for non-blocking warnings; returns its remover. */
  onWarnings: (fn: (message: string) => void) => () => void;
}

type ModalState = { mode: "settings" } | { mode: "help" } | null;

export function App({ runtime, version, onWarnings }: AppProps) {
  const { exit } = useApp();
  const { width, height } = useTerminalSize();
  const { session: controller, theme } = runtime;
  const [spec, setSpec] = useState<ThemeSpec | null>(theme.current);
  const [session, setSession] = useState<SessionState>(controller.session);
  const [warning, setWarning] = useState<string | null>(null);
  const [modal, setModal] = useState<ModalState>(null);

  useEffect(() => theme.subscribe(setSpec), [theme]);
  useEffect(() => controller.subscribe(setSession), [controller]);
  useEffect(() => onWarnings(setWarning), [onWarnings]);

  // Warnings are non-modal: shown in the status bar for a while, then dropped.
  useEffect(() => {
    if (!warning) return;
    const timer = setTimeout(() => setWarning(null), WARNING_TTL_MS);
    return () => clearTimeout(timer);
  }, [warning]);

  const activeTab = session.tabs[session.activeTabIndex];

  const setMode = useCallback((mode: Settings["themeMode"]) => {
    controller.setThemeMode(mode);
    theme.setMode(mode).catch((err: unknown) => {
      setWarning(`theme switch failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  }, [controller, theme]);

  useInput(
    (input, key) => {
      if (input === "q") {
        exit();
        return;
      }
      if (input === "?") {
        setModal({ mode: "help" });
        return;
      }
      if (input === ",") {
        setModal({ mode: "settings" });
        return;
      }
      if (input === "n") {
        controller.openTab();
        return;
      }
      if (input === "x" && activeTab) {
        void controller.closeTab(activeTab.tabId);
        return;
      }
      if (input === "t") {
        setMode(theme.mode === "live" ? "forced-system" : "live");
        return;
      }
      if (input === "r") {
        void theme.refresh();
        return;
      }
      if (key.leftArrow) {
        controller.setActiveTab(session.activeTabIndex - 1);
      } else if (key.rightArrow) {
        controller.setActiveTab(session.activeTabIndex + 1);
      } else if (input === "h") {
        controller.moveTab(session.activeTabIndex, session.activeTabIndex - 1);
      } else if (input === "l") {
        controller.moveTab(session.activeTabIndex, session.activeTabIndex + 1);
      }
    },
    { isActive: modal === null },
  );

  useInput(
    (input, key) => {
      if (key.escape || input === "?") {
        setModal(null);
      }
    },
    { isActive: modal?.mode === "help" },
  );

  const modalWidth = Math.min(60, width - 4);
  const listHeight = Math.max(4, height - PREVIEW_HEIGHT - 2);

  const renderModal = () => {
    if (!modal) return null;
    if (modal.mode === "settings") {
      return (
        <SettingsModal
          initial={{ themeMode: theme.mode, showLineNumbers: activeTab?.showLineNumbers ?? false }}
          hasActiveTab={activeTab !== undefined}
          width={modalWidth}
          onCancel={() => setModal(null)}
          onSubmit={(settings) => {
            setModal(null);
            if (settings.themeMode !== theme.mode) setMode(settings.themeMode);
            if (activeTab && settings.showLineNumbers !== activeTab.showLineNumbers) {
              controller.updateTab(activeTab.tabId, { showLineNumbers: settings.showLineNumbers });
            }
          }}
        />
      );
    }
    return (
      <Box flexDirection="column" borderStyle="round" borderColor="cyan" padding={1} width={modalWidth}>
        <Text bold color="cyan">Keys</Text>
        {[
          ["n", "open an untitled tab"],
          ["x", "close the active tab"],
          ["←/→", "previous / next tab"],
          ["h/l", "move the active tab"],
          ["t", "toggle the system theme"],
          ["r", "re-read theme sources"],
          [",", "settings"],
          ["q", "quit"],
        ].map(([k, label]) => (
          <Box key={k}>
            <Box width={8}><Text color="magenta">{k}</Text></Box>
            <Text>{label}</Text>
          </Box>
        ))}
      </Box>
    );
  };

  return (
    <Box flexDirection="column" width={width}>
      <ThemePreview spec={spec} width={width} />
      {modal ? (
        <Box justifyContent="center" height={listHeight}>{renderModal()}</Box>
      ) : (
        <TabList session={session} width={width} height={listHeight} />
      )}
      <StatusBar width={width} version={version} warning={warning} />
    </Box>
  );
}
