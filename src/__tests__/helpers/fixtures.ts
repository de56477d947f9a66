/**
 * Test Fixtures
 * Reusable test data
 */

export const directoryHtml = `
<!DOCTYPE html>
<html>
<head><title>Outproxy list</title></head>
<body>
  <h1>Known outproxies</h1>
  <table>
    <tr><th>Address</th><th>Port</th><th>Uptime</th><th>Type</th></tr>
    <tr><td>proxyA.i2p</td><td>443</td><td>100%</td><td>https</td></tr>
    <tr><td>proxyB.b32.i2p</td><td>1080</td><td>95%</td><td>socks</td></tr>
  </table>
</body>
</html>
`;

export const duplicateRowHtml = `
<table>
  <tr><td>proxyA.i2p</td><td>443</td><td>100%</td><td>https</td></tr>
  <tr><td>proxyA.i2p</td><td>443</td><td>100%</td><td>https</td></tr>
</table>
`;

export const plainRowHtml = `
<table>
  <tr><td>plain.i2p</td><td>80</td><td>99%</td><td>http</td></tr>
  <tr><td>proxyA.i2p</td><td>443</td><td>100%</td><td>https</td></tr>
</table>
`;

export const mixedDirectoryHtml = `
<html>
<body>
  <table>
    <tr><td>proxyA.i2p</td><td>443</td><td>100%</td><td>https</td></tr>
    <tr><td>clearnet.example.com</td><td>443</td><td>100%</td><td>https</td></tr>
    <tr><td>short.i2p</td><td>8080</td></tr>
  </table>
  <p>Also try <a href="https://linked.i2p/">linked</a> or <a href="https://proxyA.i2p:443/">the first one</a>.</p>
  <a href="http://plainlink.i2p/">plain link</a>
  <p>Mirror: https://mirror.i2p:8443/status</p>
  <ul>
    <li>socksy.i2p:1080</li>
    <li>other.i2p:4444</li>
    <li>tls.i2p:443</li>
  </ul>
</body>
</html>
`;

export const emptyDirectoryHtml = `
<html><body><p>No outproxies are listed right now.</p></body></html>
`;
