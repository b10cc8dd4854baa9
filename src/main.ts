import './style.css';

import { mountApp } from './app';

const app = document.getElementById('app');
if (!app) {
  throw new Error('App container missing');
}

mountApp(app);
