import type { ReferenceElectrode } from '../electrodes/table';
import { describeConversion, formatClockTime, formatOffset, formatPotential } from '../format';
import type { ConversionRecord } from '../types';

export const EMPTY_HISTORY_MESSAGE = 'No conversion history yet. Perform a conversion to see it here.';

export const HISTORY_COLUMNS = ['Input Potential', 'From Reference', 'To Reference', 'Result', 'Timestamp'] as const;

function cell(tag: 'td' | 'th', text: string) {
  const el = document.createElement(tag);
  el.textContent = text;
  return el;
}

export function renderElectrodeOptions(select: HTMLSelectElement, names: readonly string[], selected: string) {
  if (select.options.length !== names.length) {
    select.replaceChildren(
      ...names.map((name) => {
        const option = document.createElement('option');
        option.value = name;
        option.textContent = name;
        return option;
      })
    );
  }
  select.value = selected;
}

export function renderReferenceTable(tbody: HTMLTableSectionElement, electrodes: readonly ReferenceElectrode[]) {
  tbody.replaceChildren(
    ...electrodes.map((electrode) => {
      const row = document.createElement('tr');
      row.append(cell('td', electrode.name), cell('td', formatOffset(electrode.offsetVoltsVsShe)));
      return row;
    })
  );
}

export function renderHistory(container: HTMLElement, history: readonly ConversionRecord[]) {
  if (history.length === 0) {
    const info = document.createElement('p');
    info.className = 'info-message';
    info.textContent = EMPTY_HISTORY_MESSAGE;
    container.replaceChildren(info);
    return;
  }

  const table = document.createElement('table');
  table.className = 'history-table';
  const head = document.createElement('thead');
  const headRow = document.createElement('tr');
  headRow.append(...HISTORY_COLUMNS.map((title) => cell('th', title)));
  head.append(headRow);

  const body = document.createElement('tbody');
  for (const record of history) {
    const row = document.createElement('tr');
    row.append(
      cell('td', formatPotential(record.inputPotential)),
      cell('td', record.fromRef),
      cell('td', record.toRef),
      cell('td', formatPotential(record.result)),
      cell('td', formatClockTime(record.timestamp))
    );
    body.append(row);
  }
  table.append(head, body);
  container.replaceChildren(table);
}

export function renderResult(box: HTMLElement, record: ConversionRecord | null) {
  const text = box.querySelector<HTMLElement>('.result-text') ?? box;
  if (!record) {
    box.hidden = true;
    text.textContent = '';
    return;
  }
  box.hidden = false;
  text.textContent = describeConversion(record);
}

export function renderStatus(el: HTMLElement, message: string | null) {
  el.textContent = message ?? '';
  el.dataset.variant = message ? 'error' : 'idle';
}
