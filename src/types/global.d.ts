
declare namespace NodeJS {
  interface ProcessEnv {
    NODE_ENV?: string;
    HOST?: string;
    PORT?: string;
    LOG_LEVEL?: string;
    API_KEY?: string;
    API_ENV?: string;
    DEPLOY_TAG?: string;
    BUILD_TIME?: string;
    GIT_BRANCH?: string;
    GIT_COMMIT?: string;
  }
}

