import {
  APIError,
  AuthClient,
  AuthenticationError,
  getCredentialsFromEnv,
  MintsoftClient,
  ResponseObject,
  ValidationError,
} from '../packages/mintsoft-client/src/index.js';

const orderNumber = process.argv[2];

if (!orderNumber) {
  console.error('Usage: npm run workflow -- <order-number>');
  process.exit(1);
}

const credentials = getCredentialsFromEnv();

if (!credentials) {
  console.error('Error: set MINTSOFT_USERNAME and MINTSOFT_PASSWORD');
  process.exit(1);
}

async function main(username: string, password: string, search: string): Promise<void> {
  console.log('=== Step 1: Authenticate ===');
  const token = await new AuthClient().auth.authenticate(username, password);
  console.log(`Token: ${token.slice(0, 10)}...`);

  const client = new MintsoftClient({ token });

  console.log('\n=== Step 2: Search orders ===');
  const orders = await client.orders.search(search);
  const [order] = orders;
  if (!order) {
    console.log(`No orders found with number: ${search}`);
    return;
  }
  console.log(`Found ${orders.length} order(s); using ${order.id} (${order.orderNumber ?? 'no number'})`);

  console.log('\n=== Step 3: Return reasons ===');
  const reasons = await client.returns.reasons();
  for (const reason of reasons) {
    console.log(`  ${reason.isActive ? '+' : '-'} ${reason.name} (ID: ${reason.id})`);
  }
  const reason = reasons.find((candidate) => candidate.isActive);
  if (!reason?.id) {
    console.log('No active return reason available');
    return;
  }

  console.log('\n=== Step 4: Create return ===');
  const created = await client.returns.create(order.id);
  console.log(`Return ${created.id} created for order ${created.orderId}`);

  console.log('\n=== Step 5: Add return item ===');
  const firstItem = order.getArray('order_items')?.[0];
  const productId = firstItem instanceof ResponseObject ? firstItem.getIdentifier('product_id') : undefined;
  if (productId === undefined) {
    console.log('Order has no items to return');
    return;
  }
  const result = await client.returns.addItem(created.id, {
    product_id: productId,
    quantity: 1,
    reason_id: reason.id,
    notes: 'Returned via workflow script',
  });
  console.log('Item added:', JSON.stringify(result.toHash()));
}

try {
  await main(credentials.username, credentials.password, orderNumber);
} catch (error) {
  if (error instanceof ValidationError) {
    console.error(`Validation error: ${error.message}`);
  } else if (error instanceof AuthenticationError) {
    console.error(`Authentication error: ${error.message}`);
  } else if (error instanceof APIError) {
    console.error(`API error (${error.statusCode ?? 'no status'}): ${error.message}`);
  } else {
    throw error;
  }
  process.exit(1);
}
