export async function register() {
    if (process.env.NEXT_RUNTIME === 'nodejs') {
        // Load the catalog at server start so a bad seed stops the server before it takes traffic
        const { getCatalog } = await import('./lib/catalog');
        getCatalog();
    }
}
