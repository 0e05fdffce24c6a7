/**
 * @format
 * User Data Script Builder
 *
 * Fluent interface for constructing EC2 user data scripts.
 * Operates directly on a CDK `ec2.UserData` object so that CDK Tokens
 * (e.g. the app ALB DNS name import, `this.stackName`) resolve correctly via
 * CloudFormation's `Fn::Join`.
 *
 * ## Generic Methods
 * - `updateSystem()` - Run system package updates
 * - `installNginx()` - Install and enable nginx
 * - `writeEnvironmentFile()` - Write KEY=value settings for the workload
 * - `sendCfnSignal()` - Send CloudFormation signal for ASG validation
 * - `addCompletionMarker()` - Add final success banner
 *
 * ## Tier Methods
 * - `configureWebFrontend()` - Static page plus `/api/` proxy to the app ALB
 * - `configureBackend()` - Minimal backend answering `/` and `/health`
 *
 * @example Web tier
 * ```typescript
 * const userData = ec2.UserData.forLinux();
 * new UserDataBuilder(userData)
 *     .updateSystem()
 *     .installNginx()
 *     .configureWebFrontend({ apiUpstreamHost: appAlbDnsName, title: 'three-tier-app' })
 *     .sendCfnSignal({ stackName: stack.stackName, asgLogicalId, region: stack.region })
 *     .addCompletionMarker();
 * ```
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';

// =============================================================================
// TYPES & INTERFACES
// =============================================================================

/**
 * Options for the UserDataBuilder constructor.
 */
export interface UserDataBuilderOptions {
    /**
     * Skip the bash preamble (set -euxo pipefail, exec logging).
     * @default false
     */
    skipPreamble?: boolean;
}

/**
 * Configuration for the web tier frontend.
 * Used by `configureWebFrontend()`.
 */
export interface WebFrontendConfig {
    /** DNS name of the internal app ALB (supports CDK Tokens) */
    apiUpstreamHost: string;
    /** Heading shown on the static page */
    title: string;
}

/**
 * Configuration for the app tier backend.
 * Used by `configureBackend()`.
 */
export interface BackendConfig {
    /** Body returned for `/` @default 'Backend is working!' */
    message?: string;
    /** Health check path @default '/health' */
    healthPath?: string;
}

/** Path of the environment file `writeEnvironmentFile()` writes */
export const APP_ENVIRONMENT_FILE = '/etc/three-tier/app.env';

// =============================================================================
// USER DATA BUILDER CLASS
// =============================================================================

/**
 * Builder class for EC2 user data scripts.
 *
 * Provides a fluent interface — each method returns `this` for chaining.
 */
export class UserDataBuilder {
    private readonly userData: ec2.UserData;

    constructor(userData: ec2.UserData, options?: UserDataBuilderOptions) {
        this.userData = userData;

        // UserData.forLinux() already starts the script with the shebang line
        if (!options?.skipPreamble) {
            this.userData.addCommands(
                'set -euxo pipefail',
                '',
                '# Log all output',
                'exec > >(tee /var/log/user-data.log) 2>&1',
                '',
                'echo "=== User data script started at $(date) ==="',
            );
        }
    }

    // =========================================================================
    // GENERIC METHODS
    // =========================================================================

    /**
     * Add system update commands.
     */
    updateSystem(): this {
        this.userData.addCommands(`
# Update system packages
dnf update -y`);
        return this;
    }

    /**
     * Install nginx and enable it at boot.
     */
    installNginx(): this {
        this.userData.addCommands(`
# Install nginx
dnf install -y nginx
systemctl enable nginx`);
        return this;
    }

    /**
     * Write KEY=value settings to {@link APP_ENVIRONMENT_FILE}.
     * Values may be CDK Tokens (resolved by CloudFormation, not the shell).
     */
    writeEnvironmentFile(settings: Record<string, string>): this {
        const lines = Object.entries(settings).map(([key, value]) => `${key}=${value}`);
        this.userData.addCommands(`
# Workload settings
mkdir -p ${APP_ENVIRONMENT_FILE.substring(0, APP_ENVIRONMENT_FILE.lastIndexOf('/'))}
cat > ${APP_ENVIRONMENT_FILE} <<'ENVEOF'
${lines.join('\n')}
ENVEOF
chmod 0640 ${APP_ENVIRONMENT_FILE}`);
        return this;
    }

    /**
     * Send CloudFormation signal for ASG deployment validation.
     *
     * Should be called once the workload is serving, so a signal means the
     * instance can pass its target group health check.
     *
     * @param config - CFN signal configuration (supports CDK Tokens)
     */
    sendCfnSignal(config: { stackName: string; asgLogicalId: string; region: string }): this {
        this.userData.addCommands(`
# =============================================================================
# CloudFormation Signal
# =============================================================================
echo "=== Sending CloudFormation SUCCESS signal ==="

# Install cfn-bootstrap if needed (Amazon Linux 2023)
if ! command -v /opt/aws/bin/cfn-signal &> /dev/null; then
    dnf install -y aws-cfn-bootstrap
fi

/opt/aws/bin/cfn-signal --success true \\
    --stack "${config.stackName}" \\
    --resource "${config.asgLogicalId}" \\
    --region "${config.region}"`);
        return this;
    }

    /**
     * Add a completion marker to the end of user-data.
     */
    addCompletionMarker(): this {
        this.userData.addCommands(`
echo ""
echo "=============================================="
echo "=== User data completed at $(date) ==="
echo "=============================================="`);
        return this;
    }

    // =========================================================================
    // TIER METHODS
    // =========================================================================

    /**
     * Serve a static page and proxy `/api/` to the internal app ALB.
     * Requires `installNginx()` first.
     */
    configureWebFrontend(config: WebFrontendConfig): this {
        this.userData.addCommands(`
# Web frontend: static page + /api/ proxy to the app tier
cat > /usr/share/nginx/html/index.html <<'HTMLEOF'
<!DOCTYPE html>
<html>
<head><title>${config.title}</title></head>
<body>
<h1>${config.title}</h1>
<p>Served by the web tier. Backend responses are available under <a href="/api/">/api/</a>.</p>
</body>
</html>
HTMLEOF

cat > /etc/nginx/conf.d/three-tier.conf <<'NGINXEOF'
server {
    listen 80 default_server;
    root /usr/share/nginx/html;

    location = /health {
        access_log off;
        return 200 'OK';
    }

    location /api/ {
        proxy_pass http://${config.apiUpstreamHost}/;
        proxy_set_header Host $host;
        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
    }
}
NGINXEOF

# Drop the distribution's default server so ours answers on port 80
sed -i '/^    server {/,/^    }/d' /etc/nginx/nginx.conf
nginx -t
systemctl restart nginx`);
        return this;
    }

    /**
     * Serve the minimal backend: `message` on `/`, `OK` on the health path.
     * Requires `installNginx()` first.
     */
    configureBackend(config: BackendConfig = {}): this {
        const message = config.message ?? 'Backend is working!';
        const healthPath = config.healthPath ?? '/health';

        this.userData.addCommands(`
# Backend: fixed responses on port 80
cat > /etc/nginx/conf.d/three-tier.conf <<'NGINXEOF'
server {
    listen 80 default_server;

    location = ${healthPath} {
        access_log off;
        default_type text/plain;
        return 200 'OK';
    }

    location / {
        default_type text/plain;
        return 200 '${message}';
    }
}
NGINXEOF

sed -i '/^    server {/,/^    }/d' /etc/nginx/nginx.conf
nginx -t
systemctl restart nginx`);
        return this;
    }
}
