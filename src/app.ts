import { APP_TITLE, DISPLAY_PRECISION, POTENTIAL_STEP, REFERENCE_TEMPERATURE_LABEL } from './config';
import { ELECTRODE_NAMES, listReferenceElectrodes } from './electrodes/table';
import {
  clearHistory,
  createSessionState,
  runConversion,
  selectReference,
  setPotential,
  swapReferences
} from './state/session';
import type { SessionDefaults, SessionState } from './types';
import {
  renderElectrodeOptions,
  renderHistory,
  renderReferenceTable,
  renderResult,
  renderStatus
} from './ui/render';
import { errorMessage } from './utils/errors';

export interface MountOptions {
  defaults?: SessionDefaults;
  /** Clock used to timestamp history entries */
  now?: () => number;
}

export interface AppHandle {
  getState(): SessionState;
}

const TEMPLATE = `
  <aside class="sidebar" data-open="false">
    <header>
      <h2>Reference Electrode Potentials</h2>
      <p class="status-note">${REFERENCE_TEMPERATURE_LABEL}</p>
    </header>
    <table class="reference-table">
      <thead>
        <tr><th>Reference Electrode</th><th>Potential vs. SHE (V)</th></tr>
      </thead>
      <tbody id="reference-rows"></tbody>
    </table>
    <section class="section">
      <h3>About Reference Electrodes</h3>
      <p>
        Reference electrodes are essential in electrochemistry to provide a stable potential against which
        working electrode potentials are measured. Different reference electrodes are commonly used in
        different research areas or with specific electrolytes.
      </p>
      <p>
        The Standard Hydrogen Electrode (SHE) is defined as having a potential of exactly 0.000 V and serves
        as the fundamental reference point in electrochemistry.
      </p>
    </section>
  </aside>
  <button class="sidebar-toggle" id="sidebar-toggle">Reference table</button>
  <main class="content">
    <header>
      <h1>${APP_TITLE}</h1>
      <p>
        Converts potential values between electrochemical reference electrodes. Enter a potential, pick the
        original and target reference electrodes, then press Convert.
      </p>
    </header>
    <div class="columns">
      <section class="section conversion-panel">
        <h3>Potential Conversion</h3>
        <label for="potential-input">Potential Value (V)</label>
        <input id="potential-input" type="number" step="${POTENTIAL_STEP}" />
        <label for="from-select">From Reference Electrode</label>
        <select id="from-select"></select>
        <label for="to-select">To Reference Electrode</label>
        <select id="to-select"></select>
        <div class="button-row">
          <button id="swap-button" type="button">Swap References</button>
          <button id="convert-button" type="button" class="primary">Convert</button>
        </div>
        <p id="status-message" class="status-message" role="alert"></p>
        <div id="result-box" class="result-box" hidden>
          <h3>Conversion Result</h3>
          <p class="result-text"></p>
        </div>
      </section>
      <section class="section history-panel">
        <h3>Conversion History</h3>
        <div id="history"></div>
        <button id="clear-history-button" type="button">Clear History</button>
      </section>
    </div>
    <section class="section">
      <h3>Why Reference Conversion Matters</h3>
      <ol>
        <li><strong>Comparing data from different studies</strong> that use different reference electrodes</li>
        <li><strong>Relating measured potentials to standard thermodynamic values</strong> (often given vs. SHE)</li>
        <li><strong>Ensuring proper interpretation</strong> of electrochemical windows and reaction potentials</li>
        <li><strong>Reproducing literature experiments</strong> when using a different reference electrode</li>
      </ol>
      <p>
        Without proper conversion, errors of hundreds of millivolts can occur, leading to significant
        misinterpretations of electrochemical data.
      </p>
    </section>
  </main>
`;

function requireElement<T extends Element>(root: ParentNode, selector: string): T {
  const el = root.querySelector<T>(selector);
  if (!el) {
    throw new Error(`Missing element ${selector}`);
  }
  return el;
}

export function mountApp(root: HTMLElement, options: MountOptions = {}): AppHandle {
  const now = options.now ?? Date.now;
  let state = createSessionState(options.defaults);

  root.innerHTML = TEMPLATE;

  const sidebar = requireElement<HTMLElement>(root, '.sidebar');
  const sidebarToggle = requireElement<HTMLButtonElement>(root, '#sidebar-toggle');
  const referenceRows = requireElement<HTMLTableSectionElement>(root, '#reference-rows');
  const potentialInput = requireElement<HTMLInputElement>(root, '#potential-input');
  const fromSelect = requireElement<HTMLSelectElement>(root, '#from-select');
  const toSelect = requireElement<HTMLSelectElement>(root, '#to-select');
  const swapButton = requireElement<HTMLButtonElement>(root, '#swap-button');
  const convertButton = requireElement<HTMLButtonElement>(root, '#convert-button');
  const clearButton = requireElement<HTMLButtonElement>(root, '#clear-history-button');
  const statusMessage = requireElement<HTMLElement>(root, '#status-message');
  const resultBox = requireElement<HTMLElement>(root, '#result-box');
  const historyContainer = requireElement<HTMLElement>(root, '#history');

  function render() {
    // Keep what the user typed while it still matches the stored potential.
    if (readPotential() !== state.potential) {
      potentialInput.value = state.potential.toFixed(DISPLAY_PRECISION);
    }
    renderElectrodeOptions(fromSelect, ELECTRODE_NAMES, state.fromRef);
    renderElectrodeOptions(toSelect, ELECTRODE_NAMES, state.toRef);
    renderStatus(statusMessage, state.error);
    renderResult(resultBox, state.lastResult);
    renderHistory(historyContainer, state.history);
    clearButton.hidden = state.history.length === 0;
  }

  function apply(next: SessionState) {
    state = next;
    if (state.error && import.meta.env.DEV) {
      console.warn('Conversion input rejected:', state.error);
    }
    render();
  }

  function handleError(error: unknown) {
    console.error(error);
    apply({ ...state, lastResult: null, error: errorMessage(error, 'Conversion failed.') });
  }

  function readPotential() {
    const raw = potentialInput.value.trim();
    return raw === '' ? Number.NaN : Number(raw);
  }

  potentialInput.addEventListener('change', () => {
    apply(setPotential(state, readPotential()));
  });
  fromSelect.addEventListener('change', () => {
    apply(selectReference(state, 'from', fromSelect.value));
  });
  toSelect.addEventListener('change', () => {
    apply(selectReference(state, 'to', toSelect.value));
  });
  swapButton.addEventListener('click', () => {
    apply(swapReferences(state));
  });
  convertButton.addEventListener('click', () => {
    const withInput = setPotential(state, readPotential());
    try {
      apply(withInput.error ? withInput : runConversion(withInput, now()));
    } catch (error) {
      handleError(error);
    }
  });
  clearButton.addEventListener('click', () => {
    apply(clearHistory(state));
  });

  sidebarToggle.addEventListener('click', () => {
    const open = sidebar.dataset.open !== 'true';
    sidebar.dataset.open = open ? 'true' : 'false';
  });

  renderReferenceTable(referenceRows, listReferenceElectrodes());
  render();

  return {
    getState: () => state
  };
}
