import { Box, Text } from "ink";
import { tabLabel } from "../format.js";
import type { SessionState, TabState } from "../state/types.js";

interface TabListProps {
  session: SessionState;
  width: number;
  height: number;
}

const LIST_CHROME = 3; // border top/bottom + header

function shortenPath(path: string): string {
  const home = process.env.HOME;
  if (home && path.startsWith(home)) {
    return "~" + path.slice(home.length);
  }
  return path;
}

function TabRow({ tab, active, width }: { tab: TabState; active: boolean; width: number }) {
  const label = tabLabel(tab);
  const detail = tab.filePath ? shortenPath(tab.filePath) : "";
  const available = Math.max(0, width - label.length - 4);
  const trimmed = detail.length > available ? "…" + detail.slice(detail.length - available + 1) : detail;

  return (
    <Box justifyContent="space-between" width={width}>
      <Text inverse={active} color={tab.dirty ? "yellow" : undefined}>
        {active ? "▶ " : "  "}
        {label}
      </Text>
      <Text dimColor>{trimmed}</Text>
    </Box>
  );
}

export function TabList({ session, width, height }: TabListProps) {
  const innerWidth = Math.max(width - 4, 12);
  const maxVisible = Math.max(1, height - LIST_CHROME);
  const active = session.activeTabIndex;
  // Keep the active row visible.
  const offset = Math.max(0, Math.min(active - Math.floor(maxVisible / 2), session.tabs.length - maxVisible));
  const visible = session.tabs.slice(offset, offset + maxVisible);

  return (
    <Box flexDirection="column" borderStyle="single" borderColor="gray" paddingX={1} width={width} height={height}>
      <Text bold>
        Tabs ({session.tabs.length})
      </Text>
      {visible.map((tab, i) => (
        <TabRow key={tab.tabId} tab={tab} active={offset + i === active} width={innerWidth} />
      ))}
      {session.tabs.length === 0 && <Text dimColor>No open tabs. Press n for a new one.</Text>}
    </Box>
  );
}
