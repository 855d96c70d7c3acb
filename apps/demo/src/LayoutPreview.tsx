import type { Rect } from "@tilecraft/layout-engine";

interface LayoutPreviewProps {
  workspace: Rect;
  rects: readonly Rect[];
}

function percent(value: number, total: number): string {
  return total === 0 ? "0%" : `${(value / total) * 100}%`;
}

export default function LayoutPreview({ workspace, rects }: LayoutPreviewProps) {
  return (
    <ol className="layout-preview" aria-label="Layout preview">
      {rects.map((rect, index) => (
        <li
          key={index}
          className="layout-preview__tile"
          aria-label={`Window ${index + 1}`}
          style={{
            left: percent(rect.x - workspace.x, workspace.width),
            top: percent(rect.y - workspace.y, workspace.height),
            width: percent(rect.width, workspace.width),
            height: percent(rect.height, workspace.height)
          }}
        >
          {index + 1}
        </li>
      ))}
    </ol>
  );
}
