/**
 * Test Fixtures
 * Reusable test data
 */

export const ROOT_URL = 'https://docs.example.com/';

/**
 * Minimal documentation page. Links are placed in the page nav, which the
 * cleaner drops but the link discoverer still follows.
 */
export function docPage(content: string, links: string[] = []): string {
  const nav = links.map((href) => `<a href="${href}">${href}</a>`).join('\n');
  return `<!DOCTYPE html>
<html>
<head>
  <title>Example Docs</title>
</head>
<body>
  <nav>${nav}</nav>
  <main>
${content}
  </main>
  <footer><p>Copyright Example Docs</p></footer>
</body>
</html>`;
}

export const userManagementPage = docPage(`
  <h1>User Management</h1>
  <p>Create and manage user accounts. Assign roles to every member of a workspace.</p>
  <h3>Inviting Users</h3>
  <p>Send an invitation email to a new teammate.</p>
  <h3>Removing Users</h3>
`);

export const userManagmentTypoPage = docPage(`
  <h2>user managment</h2>
  <p>Accounts can be suspended by an administrator.</p>
`);
