/**
 * @tessera/core v1.0.0 - Basic Example
 *
 * Demonstrates the core building blocks:
 * - Rule-string validation with a custom guard
 * - Result chaining from raw input to an aggregate
 * - Domain events recorded by the aggregate and delivered by the dispatcher
 */

import {
  AggregateRoot,
  createConsoleLogger,
  defineGuard,
  DomainEvent,
  EventDispatcher,
  FailureReport,
  GuardEvaluator,
  GuardRegistry,
  none,
  Result,
} from '../src/index';

const logger = createConsoleLogger({ level: 'info', scope: 'demo' });

// ==================== Vocabulary ====================

const registry = GuardRegistry.withDefaults({ logger })
  .register(
    'sku',
    defineGuard('{name} must {not}be a SKU like ABC-123', (value) => typeof value === 'string' && /^[A-Z]{3}-\d{3}$/.test(value)),
  )
  .unwrap()
  .freeze();

const evaluator = new GuardEvaluator({ registry, logger });

// ==================== Domain ====================

interface ProductProps {
  sku: string;
  price: number;
  stock: number;
}

class ProductListed extends DomainEvent<{ sku: string; price: number }> {
  readonly eventName = 'ProductListed';
}

class StockDepleted extends DomainEvent<{ sku: string }> {
  readonly eventName = 'StockDepleted';
}

class Product extends AggregateRoot<ProductProps> {
  static list(props: ProductProps): Result<Product, FailureReport> {
    return evaluator
      .evaluate(props, {
        sku: 'required|sku',
        price: 'required|positive',
        stock: 'integer|ge[0]',
      })
      .map(() => {
        const product = new Product(props, none());
        product.remind(new ProductListed(product.id, { sku: props.sku, price: props.price }));
        return product;
      });
  }

  sell(quantity: number): Result<this, FailureReport> {
    return evaluator
      .evaluate({ quantity }, { quantity: `integer|positive|le[${this.props.stock}]` }, {
        quantity: `only ${this.props.stock} left in stock`,
      })
      .map(() => {
        this.props.stock -= quantity;
        if (this.props.stock === 0) {
          this.remind(new StockDepleted(this.id, { sku: this.props.sku }));
        }
        return this;
      });
  }
}

// ==================== Main Application ====================

function main(): void {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  @tessera/core v1.0.0 - Domain Demo');
  console.log('═══════════════════════════════════════════════════════════\n');

  const dispatcher = new EventDispatcher({ logger });
  dispatcher.bind(ProductListed, (event) => console.log(`📦 Listed ${event.payload.sku} at ${event.payload.price}`));
  dispatcher.bind(StockDepleted, (event) => console.log(`⚠️  ${event.payload.sku} is out of stock`));

  // 1. Invalid input
  console.log('--- 1. List an invalid product ---');
  Product.list({ sku: 'abc', price: -5, stock: 1.5 }).match({
    ok: () => console.log('unexpectedly valid'),
    err: (report) => console.log('Rejected:', report.toRecord()),
  });
  console.log();

  // 2. Valid input
  console.log('--- 2. List a valid product ---');
  const product = Product.list({ sku: 'TSR-001', price: 25, stock: 3 }).unwrap();
  dispatcher.trigger(product);
  console.log();

  // 3. Overselling
  console.log('--- 3. Sell more than the stock ---');
  console.log('Result:', product.sell(5).toString());
  console.log();

  // 4. Selling out
  console.log('--- 4. Sell the remaining stock ---');
  product
    .sell(3)
    .map((sold) => dispatcher.trigger(sold))
    .unwrapOrElse((report) => console.log('Rejected:', report.toString()));

  console.log('\n═══════════════════════════════════════════════════════════');
  console.log('  Demo Complete!');
  console.log('═══════════════════════════════════════════════════════════\n');
}

// Run
main();
