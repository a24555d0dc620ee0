export type AppRuntime = 'rails' | 'fastapi';

export type DeployMode = 'first_time' | 'code_and_migrate' | 'migrate_only';

/**
 * Row shape of the apps table, as stored.
 */
export interface AppRow {
    id: number;
    app_key: string;
    runtime: AppRuntime;
    domain: string;
    subdomain: string | null;
    source_repository: string;
    branch: string;
    deploy_path: string;
    database_name: string;
    database_username: string;
    database_password: string | null;
    secret_key_base: string | null;
    api_token: string | null;
    port: number;
    enabled: number;
    health_path: string;
    login_path: string;
    protected_path: string;
    api_path: string | null;
    api_resource_key: string | null;
    created_at: string;
    updated_at: string;
}

/**
 * A managed application without its secret columns. This is what leaves the
 * secret store for routing, paths and probes.
 */
export interface ApplicationRecord {
    appKey: string;
    runtime: AppRuntime;
    domain: string;
    subdomain: string | null;
    sourceRepository: string;
    branch: string;
    deployPath: string;
    databaseName: string;
    databaseUsername: string;
    port: number;
    enabled: boolean;
    healthPath: string;
    loginPath: string;
    protectedPath: string;
    apiPath: string | null;
    apiResourceKey: string | null;
    createdAt: string;
    updatedAt: string;
}

export interface AppApiKeyRow {
    app_key: string;
    name: string;
    value: string;
}

export interface HmsConfigRow {
    key: string;
    value: string;
    updated_at: string;
}

export interface DeployLockRow {
    app_key: string;
    holder: string;
    acquired_at: string;
}

export type DeploymentStatus = 'succeeded' | 'failed';

export interface DeploymentRow {
    id: number;
    app_key: string;
    mode: DeployMode;
    status: DeploymentStatus;
    failed_step: string | null;
    log: string;
    started_at: string;
    finished_at: string;
}

export interface NewDeployment {
    appKey: string;
    mode: DeployMode;
    status: DeploymentStatus;
    failedStep?: string;
    log: string;
    startedAt: string;
    finishedAt: string;
}

export function toApplicationRecord(row: AppRow): ApplicationRecord {
    return {
        appKey: row.app_key,
        runtime: row.runtime,
        domain: row.domain,
        subdomain: row.subdomain,
        sourceRepository: row.source_repository,
        branch: row.branch,
        deployPath: row.deploy_path,
        databaseName: row.database_name,
        databaseUsername: row.database_username,
        port: row.port,
        enabled: row.enabled === 1,
        healthPath: row.health_path,
        loginPath: row.login_path,
        protectedPath: row.protected_path,
        apiPath: row.api_path,
        apiResourceKey: row.api_resource_key,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

export function fqdn(app: Pick<ApplicationRecord, 'domain' | 'subdomain'>): string {
    return app.subdomain ? `${app.subdomain}.${app.domain}` : app.domain;
}

export function serviceName(app: Pick<ApplicationRecord, 'appKey'>): string {
    return `${app.appKey}.service`;
}
