import { useEffect, useState } from 'react';
import { useStdout } from 'ink';
import debounce from 'lodash.debounce';

export const RESIZE_DEBOUNCE_MS = 100;

export interface TerminalSize {
  columns: number;
  rows: number;
}

const FALLBACK_SIZE: TerminalSize = { columns: 80, rows: 24 };

const readSize = (stdout: NodeJS.WriteStream): TerminalSize => ({
  columns: stdout.columns || FALLBACK_SIZE.columns,
  rows: stdout.rows || FALLBACK_SIZE.rows,
});

/**
 * Terminal size, updated at most once per burst of resize events: each
 * resize cancels the pending redisplay and schedules a new one.
 */
export function useTerminalSize(): TerminalSize {
  const { stdout } = useStdout();
  const [size, setSize] = useState<TerminalSize>(() => readSize(stdout));

  useEffect(() => {
    const onResize = debounce(() => setSize(readSize(stdout)), RESIZE_DEBOUNCE_MS);

    stdout.on('resize', onResize);
    return () => {
      stdout.off('resize', onResize);
      onResize.cancel();
    };
  }, [stdout]);

  return size;
}
