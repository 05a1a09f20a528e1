import React from 'react';
import ReactDOM from 'react-dom/client';
import { BrowserRouter } from 'react-router-dom';
import App from './App';
import { resolveDatasetUrl } from './lib/config';
import { createTrackLoader } from './lib/loader';
import './index.css';

const rawBaseUrl = import.meta.env.BASE_URL;
const normalizedBase = rawBaseUrl.endsWith('/') && rawBaseUrl !== '/' ? rawBaseUrl.slice(0, -1) : rawBaseUrl;
const routerBasename = normalizedBase === '/' ? undefined : normalizedBase;

const rootElement = document.getElementById('root');
if (!rootElement) {
  throw new Error('Missing #root element');
}

const loader = createTrackLoader();

ReactDOM.createRoot(rootElement).render(
  <React.StrictMode>
    <BrowserRouter basename={routerBasename}>
      <App loader={loader} datasetUrl={resolveDatasetUrl()} />
    </BrowserRouter>
  </React.StrictMode>
);
