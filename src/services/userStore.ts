// src/services/userStore.ts
import mongoose, { Types } from 'mongoose';
import User, { IUser } from '../models/userModel.js';
import { IUserStore, NewUser, StoredUser } from '../types/services.js';
import { AppError } from '../utils/errorHandler.js';
import { withStore } from '../utils/withStore.js';

type UserRecord = IUser & { _id: Types.ObjectId };

function toStoredUser(doc: UserRecord): StoredUser {
  return {
    id: doc._id.toString(),
    email: doc.email,
    name: doc.name,
    passwordHash: doc.password,
    createdAt: doc.createdAt
  };
}

export class MongoUserStore implements IUserStore {
  async create(user: NewUser): Promise<StoredUser> {
    return withStore('user create', async () => {
      try {
        const doc = await User.create({
          email: user.email,
          name: user.name,
          password: user.passwordHash
        });
        return toStoredUser(doc);
      } catch (error) {
        // Lost a race with another registration for the same email
        if (error instanceof mongoose.mongo.MongoServerError && error.code === 11000) {
          throw new AppError('User already exists', 400, 'UserExists');
        }
        throw error;
      }
    });
  }

  async findByEmail(email: string): Promise<StoredUser | null> {
    return withStore('user lookup', async () => {
      const doc = await User.findOne({ email: email.toLowerCase() }).lean<UserRecord>().exec();
      return doc ? toStoredUser(doc) : null;
    });
  }

  async findById(id: string): Promise<StoredUser | null> {
    if (!mongoose.Types.ObjectId.isValid(id)) {
      return null;
    }
    return withStore('user lookup', async () => {
      const doc = await User.findById(id).lean<UserRecord>().exec();
      return doc ? toStoredUser(doc) : null;
    });
  }
}
