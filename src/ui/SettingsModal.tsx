import { useState } from "react";
import { Box, Text, useInput } from "ink";
import { SelectInput } from "./SelectInput.js";
import type { SelectOption } from "./SelectInput.js";
import type { ThemeModeSetting } from "../config.js";

export interface Settings {
  themeMode: ThemeModeSetting;
  showLineNumbers: boolean;
}

interface SettingsModalProps {
  initial: Settings;
  /** False when there is no active tab to apply line numbers to. */
  hasActiveTab: boolean;
  onSubmit: (settings: Settings) => void;
  onCancel: () => void;
  width: number;
}

const THEME_OPTIONS: ReadonlyArray<SelectOption<ThemeModeSetting>> = [
  { label: "Follow terminal theme", value: "live" },
  { label: "System theme", value: "forced-system" },
];

const LINE_NUMBER_OPTIONS: ReadonlyArray<SelectOption<"on" | "off">> = [
  { label: "Shown", value: "on" },
  { label: "Hidden", value: "off" },
];

export function SettingsModal({ initial, hasActiveTab, onSubmit, onCancel, width }: SettingsModalProps) {
  const [themeMode, setThemeMode] = useState(initial.themeMode);
  const [showLineNumbers, setShowLineNumbers] = useState(initial.showLineNumbers);
  const [focusIdx, setFocusIdx] = useState(0);
  const fieldCount = hasActiveTab ? 2 : 1;

  useInput((_input, key) => {
    if (key.escape) {
      onCancel();
    } else if (key.return) {
      onSubmit({ themeMode, showLineNumbers });
    } else if (key.tab || key.downArrow) {
      setFocusIdx((i) => (i + 1) % fieldCount);
    } else if (key.upArrow) {
      setFocusIdx((i) => (i - 1 + fieldCount) % fieldCount);
    }
  });

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" padding={1} width={width}>
      <Box justifyContent="center" marginBottom={1}>
        <Text bold color="cyan">Settings</Text>
      </Box>
      <Box>
        <Box width={16}>
          <Text color={focusIdx === 0 ? "cyan" : undefined}>Theme</Text>
        </Box>
        <SelectInput options={THEME_OPTIONS} value={themeMode} onChange={setThemeMode} focus={focusIdx === 0} />
      </Box>
      {hasActiveTab && (
        <Box>
          <Box width={16}>
            <Text color={focusIdx === 1 ? "cyan" : undefined}>Line numbers</Text>
          </Box>
          <SelectInput
            options={LINE_NUMBER_OPTIONS}
            value={showLineNumbers ? "on" : "off"}
            onChange={(v) => setShowLineNumbers(v === "on")}
            focus={focusIdx === 1}
          />
        </Box>
      )}
      <Box marginTop={1}>
        <Text dimColor>←→ change · Tab next · Enter save · Esc cancel</Text>
      </Box>
    </Box>
  );
}
