import { useState, useCallback, useEffect } from 'react';

export type NoticeType = 'info' | 'warning' | 'error';

export interface Notice {
  id: string;
  message: string;
  type: NoticeType;
  duration: number;
}

export interface NoticeInput {
  message: string;
  type: NoticeType;
  duration?: number;
}

const DEFAULT_DURATION_MS = 4000;
const ERROR_DURATION_MS = 8000;

let noticeCounter = 0;

const toNotice = ({ message, type, duration }: NoticeInput): Notice => {
  noticeCounter++;
  return {
    id: `notice-${noticeCounter}`,
    message,
    type,
    duration: duration ?? (type === 'error' ? ERROR_DURATION_MS : DEFAULT_DURATION_MS),
  };
};

/**
 * Transient messages under the status line. The oldest notice expires
 * after its duration, then the next one starts counting.
 */
export const useNotices = (initial: readonly NoticeInput[] = []) => {
  const [notices, setNotices] = useState<Notice[]>(() => initial.map(toNotice));

  const showNotice = useCallback((message: string, type: NoticeType = 'info', duration?: number) => {
    const notice = toNotice({ message, type, duration });
    setNotices(prev => [...prev, notice]);
    return notice.id;
  }, []);

  const removeNotice = useCallback((id: string) => {
    setNotices(prev => prev.filter(notice => notice.id !== id));
  }, []);

  const oldest = notices[0];
  useEffect(() => {
    if (!oldest) {
      return;
    }
    const timeoutId = setTimeout(() => removeNotice(oldest.id), oldest.duration);
    return () => clearTimeout(timeoutId);
  }, [oldest, removeNotice]);

  const showError = useCallback((message: string, duration?: number) => {
    return showNotice(message, 'error', duration);
  }, [showNotice]);

  const showInfo = useCallback((message: string, duration?: number) => {
    return showNotice(message, 'info', duration);
  }, [showNotice]);

  return {
    notices,
    showError,
    showInfo,
  };
};
