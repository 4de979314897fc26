import { Box, Text } from "ink";

interface Binding {
  key: string;
  label: string;
}

// Ordered by display priority for the status bar
const BINDINGS: Binding[] = [
  { key: "n", label: "new" },
  { key: "x", label: "close" },
  { key: "←→", label: "tabs" },
  { key: "h/l", label: "move" },
  { key: "t", label: "system theme" },
  { key: "r", label: "reload" },
  { key: ",", label: "settings" },
  { key: "q", label: "quit" },
];

function bindingWidth(b: Binding): number {
  // key + space + label + double-space separator
  return b.key.length + 1 + b.label.length + 2;
}

interface StatusBarProps {
  width: number;
  version: string;
  warning: string | null;
}

export function StatusBar({ width, version, warning }: StatusBarProps) {
  const brandWidth = " omnote".length + ` v${version}`.length;
  const available = width - brandWidth;

  if (warning) {
    const text = warning.length > available ? warning.slice(0, Math.max(0, available - 1)) + "…" : warning;
    return (
      <Box justifyContent="space-between">
        <Text color="yellow">{text}</Text>
        <Text dimColor>{` v${version}`}</Text>
      </Box>
    );
  }

  const visible: Binding[] = [];
  let used = 0;
  for (const b of BINDINGS) {
    const w = bindingWidth(b);
    if (used + w <= available) {
      visible.push(b);
      used += w;
    }
  }

  return (
    <Box justifyContent="space-between">
      <Text>
        {visible.map((b) => (
          <Text key={b.key}>
            <Text color="magenta">{b.key}</Text>
            <Text dimColor>{` ${b.label}  `}</Text>
          </Text>
        ))}
      </Text>
      <Text>
        <Text bold color="cyan">{" omnote"}</Text>
        <Text dimColor>{` v${version}`}</Text>
      </Text>
    </Box>
  );
}
