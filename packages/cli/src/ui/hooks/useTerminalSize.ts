/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { useEffect, useState } from 'react';
import { useStdout } from 'ink';

const DEFAULT_COLUMNS = 80;
const DEFAULT_ROWS = 24;

export function useTerminalSize(): { columns: number; rows: number } {
  // Read from the stdout Ink renders to, so layout and size agree
  const { stdout } = useStdout();

  const [size, setSize] = useState(() => ({
    columns: stdout.columns || DEFAULT_COLUMNS,
    rows: stdout.rows || DEFAULT_ROWS,
  }));

  useEffect(() => {
    let resizeTimeout: NodeJS.Timeout | undefined;

    function updateSize() {
      if (resizeTimeout) {
        clearTimeout(resizeTimeout);
      }

      // Only update after resizing settles
      resizeTimeout = setTimeout(() => {
        const newSize = {
          columns: stdout.columns || DEFAULT_COLUMNS,
          rows: stdout.rows || DEFAULT_ROWS,
        };
        setSize((current) =>
          current.columns === newSize.columns && current.rows === newSize.rows
            ? current
            : newSize,
        );
      }, 150);
    }

    stdout.on('resize', updateSize);

    return () => {
      stdout.off('resize', updateSize);
      if (resizeTimeout) {
        clearTimeout(resizeTimeout);
      }
    };
  }, [stdout]);

  return size;
}
