import { getFlags } from "../context/flags";
import { listProviders } from "../providers";
import type { ProviderId } from "../providers/types";
import { printJson, renderRows } from "../ui/output";

export type ProviderStatus = {
  id: ProviderId;
  label: string;
  binary: string;
  available: boolean;
  path: string | null;
};

export type ProvidersReport = {
  selected: ProviderId | null;
  providers: ProviderStatus[];
};

export function collectProviderStatus(): ProvidersReport {
  const providers = listProviders().map((provider) => {
    const found = provider.locate();
    return {
      id: provider.id,
      label: provider.label,
      binary: provider.binary,
      available: found !== null,
      path: found
    };
  });
  const selected = providers.find((status) => status.available)?.id ?? null;
  return { selected, providers };
}

export function runProviders(): ProvidersReport {
  const report = collectProviderStatus();
  if (getFlags().output === "json") {
    printJson(report);
    return report;
  }
  const rows = [
    ["PROVIDER", "BINARY", "STATUS"],
    ...report.providers.map((status) => [
      status.id === report.selected ? `${status.label} *` : status.label,
      status.binary,
      status.path ?? "not found"
    ])
  ];
  console.log(renderRows(rows));
  console.log("");
  console.log(report.selected ? `Provider selected: ${report.selected}` : "No provider available.");
  return report;
}
