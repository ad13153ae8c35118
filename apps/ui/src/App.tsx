import { PageView } from './components/page-view.tsx';
import { Sidebar } from './components/sidebar.tsx';
import { useDashboardModel, useReloadDataset } from './hooks/use-dashboard-data.ts';
import { APP_CSS, THEME } from './lib/theme.ts';
import { useDashboardStore } from './store/index.ts';

function readErrorMessage(error: unknown, fallback: string): string {
  if (error instanceof Error && error.message.trim().length > 0) {
    return error.message;
  }
  return fallback;
}

export function App() {
  const dashboard = useDashboardModel();
  const reload = useReloadDataset();
  const activePageId = useDashboardStore((s) => s.activePageId);
  const setActivePage = useDashboardStore((s) => s.setActivePage);
  const sidebarOpen = useDashboardStore((s) => s.sidebarOpen);
  const toggleSidebar = useDashboardStore((s) => s.toggleSidebar);

  const activePage = dashboard.model?.pages.find((page) => page.id === activePageId) ?? dashboard.model?.pages[0];

  return (
    <div
      className="kpi-board"
      style={{
        display: 'flex',
        minHeight: '100vh',
        background: THEME.bg,
        color: THEME.text,
        fontFamily: 'Inter, system-ui, sans-serif',
      }}
    >
      <style>{APP_CSS}</style>
      {sidebarOpen && dashboard.model && dashboard.data && (
        <Sidebar
          pages={dashboard.model.pages}
          activePageId={activePageId}
          overview={dashboard.model.overview}
          sourceFile={dashboard.data.sourceFile}
          onSelectPage={setActivePage}
          onReload={reload}
        />
      )}

      <main style={{ flex: 1, padding: '1.5rem', minWidth: 0 }}>
        <button type="button" onClick={toggleSidebar} style={{ marginBottom: 12 }}>
          {sidebarOpen ? 'Hide menu' : 'Show menu'}
        </button>

        {dashboard.isLoading && <p style={{ color: THEME.muted }}>Loading prepared dataset...</p>}
        {dashboard.isError && (
          <section
            style={{
              padding: '1rem',
              border: `1px solid ${THEME.danger}`,
              borderRadius: 16,
              background: THEME.panel,
            }}
          >
            <h2 style={{ marginTop: 0 }}>Prepared dataset unavailable</h2>
            <p>{readErrorMessage(dashboard.error, 'The dataset could not be loaded.')}</p>
            <button type="button" onClick={reload}>
              Try again
            </button>
          </section>
        )}
        {activePage && <PageView page={activePage} />}
      </main>
    </div>
  );
}
