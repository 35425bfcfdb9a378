import 'dotenv/config';
import { app } from './index';
import { closeDB, connectDB } from './config/mongodb';

const port = process.env.PORT || 3000;

const startServer = async () => {
  try {
    // Use MONGODB_URI_TEST if in test environment, otherwise use MONGODB_URI from .env
    const mongoUri = process.env.NODE_ENV === 'test' ? process.env.MONGODB_URI_TEST : process.env.MONGODB_URI;
    await connectDB(mongoUri);

    app.listen(port, () => {
      console.log(`Server is running on http://localhost:${port}`);
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

process.on('SIGINT', () => {
  void closeDB();
});

void startServer();
