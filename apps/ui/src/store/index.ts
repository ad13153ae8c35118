import { create } from 'zustand';
import type { DashboardPage, DashboardPageId, DashboardTab } from '@kpi-board/metrics';

interface DashboardState {
  activePageId: DashboardPageId;
  activeTabByPage: Partial<Record<DashboardPageId, string>>;
  sidebarOpen: boolean;
  setActivePage: (pageId: DashboardPageId) => void;
  setActiveTab: (pageId: DashboardPageId, tabId: string) => void;
  toggleSidebar: () => void;
}

export const useDashboardStore = create<DashboardState>()((set) => ({
  activePageId: 'executive-summary',
  activeTabByPage: {},
  sidebarOpen: true,
  setActivePage: (pageId) => { set({ activePageId: pageId }); },
  setActiveTab: (pageId, tabId) => {
    set((s) => ({ activeTabByPage: { ...s.activeTabByPage, [pageId]: tabId } }));
  },
  toggleSidebar: () => { set((s) => ({ sidebarOpen: !s.sidebarOpen })); },
}));

/** The remembered tab of a page, or its first tab when none was chosen or it no longer exists. */
export function resolveActiveTab(page: DashboardPage, tabId: string | undefined): DashboardTab | null {
  return page.tabs.find((tab) => tab.id === tabId) ?? page.tabs[0] ?? null;
}
