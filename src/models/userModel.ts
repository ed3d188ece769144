import mongoose, { Schema } from "mongoose";

export interface IUser {
    email: string;
    // bcrypt hash; hashing happens in AuthService before the document is built
    password: string;
    name: string;
    createdAt: Date;
}

export const userSchema = new Schema<IUser>({
    email: { 
        type: String, 
        required: true, 
        unique: true,
        lowercase: true,
        trim: true 
    },
    password: { 
        type: String, 
        required: true
    },
    name: { 
        type: String, 
        required: true,
        trim: true 
    },
    createdAt: { 
        type: Date, 
        default: Date.now 
    }
});

export default mongoose.model<IUser>('User', userSchema);
