/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_DEFAULT_POTENTIAL?: string;
  readonly VITE_DEFAULT_FROM_REF?: string;
  readonly VITE_DEFAULT_TO_REF?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
