export enum Permission {
    // Stock permissions
    STOCK_VIEW = 'stock.view',
    STOCK_RECEIVE = 'stock.receive',
    STOCK_CONSUME = 'stock.consume',
    STOCK_PROCESS = 'stock.process',

    // Reports permissions
    REPORTS_VIEW = 'reports.view',

    // Audit log permissions
    LOGS_VIEW = 'logs.view',
}

// Default permissions by role, used when a token carries no explicit list
export const DEFAULT_ROLE_PERMISSIONS: Record<'owner' | 'manager' | 'player', Permission[]> = {
    owner: Object.values(Permission), // Owner has all permissions
    manager: [
        Permission.STOCK_VIEW,
        Permission.STOCK_RECEIVE,
        Permission.STOCK_CONSUME,
        Permission.STOCK_PROCESS,
        Permission.REPORTS_VIEW,
        Permission.LOGS_VIEW,
    ],
    player: [
        Permission.STOCK_VIEW,
        Permission.STOCK_CONSUME,
    ],
};
