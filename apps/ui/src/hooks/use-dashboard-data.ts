import { useMemo } from 'react';
import { useQuery, useQueryClient } from '@tanstack/react-query';
import {
  buildDashboardOverview,
  buildDashboardPages,
  type DashboardDataset,
  type DashboardOverview,
  type DashboardPage,
} from '@kpi-board/metrics';
import { fetchPreparedDataset } from '../lib/dashboard-api.ts';

export const DATASET_QUERY_KEY = ['dataset'] as const;

export interface DashboardModel {
  pages: DashboardPage[];
  overview: DashboardOverview;
}

export function buildDashboardModel(dataset: DashboardDataset): DashboardModel {
  return {
    pages: buildDashboardPages(dataset),
    overview: buildDashboardOverview(dataset),
  };
}

export function usePreparedDatasetQuery() {
  return useQuery({
    queryKey: DATASET_QUERY_KEY,
    queryFn: () => fetchPreparedDataset(),
    staleTime: 30_000,
  });
}

export function useDashboardModel() {
  const datasetQuery = usePreparedDatasetQuery();
  const dataset = datasetQuery.data;
  const model = useMemo(() => (dataset ? buildDashboardModel(dataset) : null), [dataset]);
  return { ...datasetQuery, model };
}

export function useReloadDataset() {
  const queryClient = useQueryClient();
  return () => {
    void queryClient.invalidateQueries({ queryKey: DATASET_QUERY_KEY });
  };
}
